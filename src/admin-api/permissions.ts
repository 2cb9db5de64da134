export const ADMIN_PERMISSIONS = {
  VIEW_PERMISSIONS: 'view_permissions',
  VIEW_POSITIONS: 'view_positions',
  MANAGE_POSITIONS: 'manage_positions',
  VIEW_USERS: 'view_users',
  MANAGE_USERS: 'manage_users',
} as const;
