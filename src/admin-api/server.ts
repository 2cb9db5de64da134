import Database from 'better-sqlite3';
import { createAuthorizationService } from '../authz/index.js';
import { loadCatalog } from '../authz/catalog.js';
import type { AuditSink } from '../authz/types.js';
import { initAuditSchema } from '../audit-db/schema.js';
import { SqliteAuditSink } from '../audit-db/sink.js';
import { HttpAuditSink } from '../shared/audit-client.js';
import { loadConfig, type AppConfig } from '../shared/config.js';
import { SqlitePositionStore } from '../store/position-store.js';
import { openDatabase } from '../store/schema.js';
import { loadPositionDefinitions, seedPositions } from '../store/seed.js';
import { SqliteUserDirectory } from '../store/user-store.js';
import { createAdminApp } from './app.js';

function createAuditSink(config: AppConfig): AuditSink {
  if (config.auditDbUrl) {
    return new HttpAuditSink({
      auditUrl: config.auditDbUrl,
      secret: config.internalSecret,
      timeoutMs: config.storageTimeoutMs,
    });
  }
  const auditDb = new Database(config.auditDbPath);
  auditDb.pragma('journal_mode = WAL');
  initAuditSchema(auditDb);
  return new SqliteAuditSink(auditDb);
}

const config = loadConfig();

const db = openDatabase(config.dbPath);
const catalog = loadCatalog(config.catalogPath);
const service = createAuthorizationService({
  catalog,
  positions: new SqlitePositionStore(db),
  users: new SqliteUserDirectory(db),
  audit: createAuditSink(config),
  storageTimeoutMs: config.storageTimeoutMs,
});

const seeded = await seedPositions(service.registry, loadPositionDefinitions(config.positionsPath));
// eslint-disable-next-line no-console
console.log(
  `Catalog v${catalog.version}: ${catalog.size} permissions; positions created=${seeded.created.length} existing=${seeded.existing.length}`,
);

const app = createAdminApp({ service, jwtSecret: config.jwtSecret });

app.listen(config.port, '0.0.0.0', () => {
  // eslint-disable-next-line no-console
  console.log(`admin-api listening on port ${config.port}`);
});
