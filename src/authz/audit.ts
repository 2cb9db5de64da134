import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from './errors.js';
import type { AuditSink, MutationAction, MutationAuditEntry, MutationContext } from './types.js';

export const SYSTEM_CONTEXT: MutationContext = { actor_id: null };

export function buildMutationEntry(
  ctx: MutationContext,
  tableName: string,
  recordId: string,
  action: MutationAction,
  oldValues: Record<string, unknown> | null,
  newValues: Record<string, unknown> | null,
): MutationAuditEntry {
  return {
    id: uuidv4(),
    timestamp: new Date().toISOString(),
    actor_id: ctx.actor_id,
    table_name: tableName,
    record_id: recordId,
    action,
    old_values: oldValues,
    new_values: newValues,
    ip_address: ctx.ip_address ?? null,
    user_agent: ctx.user_agent ?? null,
  };
}

/**
 * Mutation records are written after the change has committed, so a sink
 * failure cannot undo it; the entry is logged in full instead.
 */
export async function recordMutation(sink: AuditSink, entry: MutationAuditEntry): Promise<void> {
  try {
    await sink.recordMutation(entry);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error('Mutation audit failed:', errorMessage(err), JSON.stringify(entry));
  }
}
