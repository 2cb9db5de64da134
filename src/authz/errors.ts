import type { AuthorizationDecision, PermissionId } from './types.js';

export type AuthzErrorCode =
  | 'UnknownPermission'
  | 'UnknownPosition'
  | 'UnknownUser'
  | 'InvalidPermissionSet'
  | 'DuplicateName'
  | 'PositionInUse'
  | 'ProtectedPosition'
  | 'StorageUnavailable'
  | 'InvalidInput'
  | 'AccessDenied';

export class AuthzError extends Error {
  public readonly code: AuthzErrorCode;
  public readonly statusCode: number;

  constructor(code: AuthzErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * A route or caller asked about an id the catalog does not hold.
 * This is a defect in the caller, never a denial.
 */
export class UnknownPermissionError extends AuthzError {
  public readonly permissionIds: PermissionId[];

  constructor(permissionIds: PermissionId[]) {
    super(
      'UnknownPermission',
      `Unknown permission${permissionIds.length === 1 ? '' : 's'}: ${permissionIds.join(', ')}`,
      500,
    );
    this.permissionIds = permissionIds;
  }
}

export class UnknownPositionError extends AuthzError {
  constructor(public readonly positionId: string) {
    super('UnknownPosition', `Position ${positionId} not found`, 404);
  }
}

export class UnknownUserError extends AuthzError {
  constructor(public readonly userId: string) {
    super('UnknownUser', `User ${userId} not found`, 404);
  }
}

export class InvalidPermissionSetError extends AuthzError {
  constructor(public readonly invalidIds: PermissionId[]) {
    super('InvalidPermissionSet', `Permissions not in catalog: ${invalidIds.join(', ')}`, 400);
  }
}

export class DuplicateNameError extends AuthzError {
  constructor(public readonly duplicateName: string) {
    super('DuplicateName', `Name "${duplicateName}" is already taken`, 409);
  }
}

export class PositionInUseError extends AuthzError {
  constructor(
    public readonly positionId: string,
    public readonly userCount: number,
  ) {
    super('PositionInUse', `Position ${positionId} is still assigned to ${userCount} user(s)`, 409);
  }
}

export class ProtectedPositionError extends AuthzError {
  constructor(
    public readonly positionId: string,
    detail: string,
  ) {
    super('ProtectedPosition', `Position ${positionId} is protected: ${detail}`, 403);
  }
}

export class StorageUnavailableError extends AuthzError {
  constructor(
    public readonly operation: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('StorageUnavailable', `Storage unavailable during ${operation}${detail}`, 503);
    this.cause = cause;
  }
}

export class InvalidInputError extends AuthzError {
  constructor(message: string) {
    super('InvalidInput', message, 400);
  }
}

export class AccessDeniedError extends AuthzError {
  constructor(public readonly decision: AuthorizationDecision) {
    const required = decision.required.join(decision.mode === 'any' ? ' | ' : ', ');
    super('AccessDenied', `Access denied (${decision.reason ?? 'denied'}): requires ${required}`, 403);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
