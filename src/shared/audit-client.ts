import type { AuditSink, AuthorizationDecision, MutationAuditEntry } from '../authz/types.js';
import { generateInternalToken } from './auth.js';

export interface HttpAuditSinkConfig {
  auditUrl?: string;
  secret: string;
  /** Aborts a send that gets no answer in time. */
  timeoutMs?: number;
}

export const DEFAULT_AUDIT_TIMEOUT_MS = 2_000;

/**
 * Sends audit records to the audit-db service. Unlike a fire-and-forget log
 * call, each send is awaited and rejects unless the service stored it.
 */
export class HttpAuditSink implements AuditSink {
  private readonly auditUrl: string;

  constructor(private readonly config: HttpAuditSinkConfig) {
    this.auditUrl = (config.auditUrl ?? 'http://audit-db:9000').replace(/\/+$/, '');
  }

  recordDecision(decision: AuthorizationDecision): Promise<void> {
    return this.post('/decisions', decision);
  }

  recordMutation(entry: MutationAuditEntry): Promise<void> {
    return this.post('/log', entry);
  }

  private async post(path: string, body: unknown): Promise<void> {
    const token = generateInternalToken(this.config.secret);
    const resp = await fetch(`${this.auditUrl}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_AUDIT_TIMEOUT_MS),
    });

    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`audit-db returned ${resp.status}: ${text}`);
    }
  }
}
