import { Router } from 'express';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { errorMessage } from '../authz/errors.js';
import { sanitizeMutation } from './sink.js';
import {
  insertDecision,
  insertMutation,
  queryDecisions,
  queryMutations,
  querySecurityEvents,
} from './schema.js';

const permissionList = z.array(z.string());
const nullableRecord = z.record(z.unknown()).nullable();

const decisionSchema = z.object({
  decision_id: z.string().min(1),
  user_id: z.string().min(1),
  mode: z.enum(['single', 'all', 'any']),
  required: permissionList,
  effective: permissionList,
  missing: permissionList,
  outcome: z.enum(['ALLOW', 'DENY']),
  reason: z
    .enum(['NoPosition', 'PositionInactive', 'InsufficientPermission', 'StorageUnavailable'])
    .nullable(),
  position_id: z.string().nullable(),
  catalog_version: z.number().int(),
  timestamp: z.string().min(1),
});

const mutationSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().min(1),
  actor_id: z.string().nullable(),
  table_name: z.string().min(1),
  record_id: z.string().min(1),
  action: z.enum(['CREATE', 'UPDATE', 'DELETE']),
  old_values: nullableRecord,
  new_values: nullableRecord,
  ip_address: z.string().nullable(),
  user_agent: z.string().nullable(),
});

const decisionQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  user_id: z.string().optional(),
  outcome: z.enum(['ALLOW', 'DENY']).optional(),
});

const mutationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  table_name: z.string().optional(),
  record_id: z.string().optional(),
});

export function createAuditRoutes(db: Database.Database): Router {
  const router = Router();

  // POST /decisions: append one authorization decision
  router.post('/decisions', (req, res) => {
    const parsed = decisionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ status: 'error', error: parsed.error.issues[0]?.message ?? 'invalid body' });
      return;
    }
    try {
      insertDecision(db, parsed.data);
      res.json({ status: 'ok' });
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  // POST /log: append one mutation record
  router.post('/log', (req, res) => {
    const parsed = mutationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ status: 'error', error: parsed.error.issues[0]?.message ?? 'invalid body' });
      return;
    }
    try {
      insertMutation(db, sanitizeMutation(parsed.data));
      res.json({ status: 'ok' });
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  router.get('/decisions', (req, res) => {
    const parsed = decisionQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ status: 'error', error: 'invalid query' });
      return;
    }
    try {
      res.json(queryDecisions(db, parsed.data));
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  router.get('/log', (req, res) => {
    const parsed = mutationQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ status: 'error', error: 'invalid query' });
      return;
    }
    try {
      res.json(queryMutations(db, parsed.data));
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  router.get('/security-events', (req, res) => {
    const parsed = z.coerce.number().int().min(1).max(1000).optional().safeParse(req.query.limit);
    try {
      res.json(querySecurityEvents(db, parsed.success ? parsed.data : undefined));
    } catch (err) {
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  return router;
}
