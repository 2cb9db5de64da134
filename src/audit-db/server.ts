import express from 'express';
import Database from 'better-sqlite3';
import { verifyInternalToken } from '../shared/auth.js';
import { loadConfig } from '../shared/config.js';
import { createAuditRoutes } from './routes.js';
import { initAuditSchema } from './schema.js';

const config = loadConfig();

const db = new Database(config.auditDbPath);
db.pragma('journal_mode = WAL');
initAuditSchema(db);

const app = express();
app.use(express.json());

const startTime = Date.now();

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', uptime_s: Math.floor((Date.now() - startTime) / 1000) });
});

app.use(verifyInternalToken(config.internalSecret));
app.use(createAuditRoutes(db));

app.listen(config.auditPort, '0.0.0.0', () => {
  // eslint-disable-next-line no-console
  console.log(`audit-db listening on port ${config.auditPort}`);
});
