import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import jwt from 'jsonwebtoken';
import type { AuthorizationDecision, MutationAuditEntry } from '../../authz/types.js';
import { HttpAuditSink } from '../audit-client.js';

const SECRET = 'test-secret';

const DECISION: AuthorizationDecision = {
  decision_id: 'd-1',
  user_id: 'user-1',
  mode: 'single',
  required: ['view_assets'],
  effective: ['view_assets'],
  missing: [],
  outcome: 'ALLOW',
  reason: null,
  position_id: 'pos-1',
  catalog_version: 1,
  timestamp: '2026-05-01T10:00:00.000Z',
};

const ENTRY: MutationAuditEntry = {
  id: 'm-1',
  timestamp: '2026-05-01T10:00:00.000Z',
  actor_id: null,
  table_name: 'positions',
  record_id: 'pos-1',
  action: 'DELETE',
  old_values: { name_en: 'Clerk' },
  new_values: null,
  ip_address: null,
  user_agent: null,
};

describe('HttpAuditSink', () => {
  let fetchSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchSpy = vi.fn().mockResolvedValue({ ok: true, status: 200, text: async () => '' });
    vi.stubGlobal('fetch', fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should post decisions with an internal token', async () => {
    const sink = new HttpAuditSink({ auditUrl: 'http://audit.local:9000/', secret: SECRET });
    await sink.recordDecision(DECISION);

    expect(fetchSpy).toHaveBeenCalledOnce();
    const [url, options] = fetchSpy.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('http://audit.local:9000/decisions');
    expect(options.method).toBe('POST');
    expect(JSON.parse(String(options.body))).toEqual(DECISION);

    const headers = options.headers as Record<string, string>;
    const token = headers.Authorization.replace('Bearer ', '');
    expect(() => jwt.verify(token, SECRET, { issuer: 'asset-authz' })).not.toThrow();
  });

  it('should post mutations to /log on the default host', async () => {
    await new HttpAuditSink({ secret: SECRET }).recordMutation(ENTRY);
    expect(fetchSpy.mock.calls[0][0]).toBe('http://audit-db:9000/log');
  });

  it('should reject when the service does not store the record', async () => {
    fetchSpy.mockResolvedValue({ ok: false, status: 503, text: async () => 'database is locked' });
    const sink = new HttpAuditSink({ secret: SECRET });

    await expect(sink.recordDecision(DECISION)).rejects.toThrow('audit-db returned 503: database is locked');
  });

  it('should reject when the service is unreachable', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
    await expect(new HttpAuditSink({ secret: SECRET }).recordMutation(ENTRY)).rejects.toThrow('fetch failed');
  });

  it('should abort a send the service never answers', async () => {
    fetchSpy.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
        }),
    );
    const sink = new HttpAuditSink({ secret: SECRET, timeoutMs: 20 });

    await expect(sink.recordDecision(DECISION)).rejects.toMatchObject({ name: 'TimeoutError' });
  });
});
