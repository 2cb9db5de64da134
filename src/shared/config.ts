import { fileURLToPath } from 'node:url';
import { DEFAULT_STORAGE_TIMEOUT_MS } from '../authz/storage-guard.js';

export interface AppConfig {
  port: number;
  auditPort: number;
  dbPath: string;
  auditDbPath: string;
  /** When set, decisions and mutation records go to the audit-db service over HTTP. */
  auditDbUrl: string | null;
  internalSecret: string;
  jwtSecret: string;
  storageTimeoutMs: number;
  catalogPath: string;
  positionsPath: string;
}

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/permissions.json', import.meta.url));
const DEFAULT_POSITIONS_PATH = fileURLToPath(new URL('../../data/positions.json', import.meta.url));

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`${name} must be set`);
  return value;
}

function intEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) throw new Error(`${name} must be a positive integer, got "${raw}"`);
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intEnv(env, 'PORT', 9100),
    auditPort: intEnv(env, 'AUDIT_PORT', 9000),
    dbPath: env.DB_PATH ?? '/data/authz.db',
    auditDbPath: env.AUDIT_DB_PATH ?? '/data/audit.db',
    auditDbUrl: env.AUDIT_DB_URL || null,
    internalSecret: requireEnv(env, 'INTERNAL_SECRET'),
    jwtSecret: requireEnv(env, 'JWT_SECRET'),
    storageTimeoutMs: intEnv(env, 'STORAGE_TIMEOUT_MS', DEFAULT_STORAGE_TIMEOUT_MS),
    catalogPath: env.CATALOG_PATH ?? DEFAULT_CATALOG_PATH,
    positionsPath: env.POSITIONS_PATH ?? DEFAULT_POSITIONS_PATH,
  };
}
