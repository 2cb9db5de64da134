export type PermissionId = string;

export interface Permission {
  id: PermissionId;
  label: string;
  description: string;
  module: string;
}

export interface Position {
  id: string;
  name_en: string;
  name_ar: string | null;
  description: string | null;
  level: number;
  is_active: boolean;
  /** Grants whatever the catalog holds at check time instead of a stored snapshot. */
  is_full_catalog_grant: boolean;
  permission_ids: PermissionId[];
  created_at: string;
  updated_at: string;
}

export interface CreatePositionInput {
  name_en: string;
  name_ar?: string | null;
  description?: string | null;
  level?: number;
  permission_ids: PermissionId[];
}

export interface PositionDetailsPatch {
  name_en?: string;
  name_ar?: string | null;
  description?: string | null;
  level?: number;
  is_active?: boolean;
}

export type CheckMode = 'single' | 'all' | 'any';

export type DecisionOutcome = 'ALLOW' | 'DENY';

export type DenyReason =
  | 'NoPosition'
  | 'PositionInactive'
  | 'InsufficientPermission'
  | 'StorageUnavailable';

export interface AuthorizationDecision {
  decision_id: string;
  user_id: string;
  mode: CheckMode;
  required: PermissionId[];
  effective: PermissionId[];
  missing: PermissionId[];
  outcome: DecisionOutcome;
  reason: DenyReason | null;
  position_id: string | null;
  catalog_version: number;
  timestamp: string;
}

export type MutationAction = 'CREATE' | 'UPDATE' | 'DELETE';

export interface MutationContext {
  actor_id: string | null;
  ip_address?: string | null;
  user_agent?: string | null;
}

export interface MutationAuditEntry {
  id: string;
  timestamp: string;
  actor_id: string | null;
  table_name: string;
  record_id: string;
  action: MutationAction;
  old_values: Record<string, unknown> | null;
  new_values: Record<string, unknown> | null;
  ip_address: string | null;
  user_agent: string | null;
}

/** Append-only receiver of every decision and every registry/binding mutation. */
export interface AuditSink {
  recordDecision(decision: AuthorizationDecision): Promise<void>;
  recordMutation(entry: MutationAuditEntry): Promise<void>;
}

export interface PositionStore {
  list(): Promise<Position[]>;
  findById(id: string): Promise<Position | null>;
  findFullCatalogGrant(): Promise<Position | null>;
  insert(position: Position): Promise<void>;
  /** Replaces the whole permission set in one transaction. */
  replacePermissions(id: string, permissionIds: PermissionId[], updatedAt: string): Promise<void>;
  updateDetails(id: string, patch: PositionDetailsPatch, updatedAt: string): Promise<void>;
  delete(id: string): Promise<void>;
}

/** The user-management collaborator. Only bindings write through it. */
export interface UserDirectory {
  exists(userId: string): Promise<boolean>;
  getPositionId(userId: string): Promise<string | null>;
  setPositionId(userId: string, positionId: string, updatedAt: string): Promise<void>;
  countByPosition(positionId: string): Promise<number>;
}
