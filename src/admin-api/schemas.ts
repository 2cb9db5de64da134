import { z } from 'zod';

const name = z.string().trim().min(1).max(100);
const permissionIds = z.array(z.string().min(1)).max(500);

export const createPositionBody = z.object({
  name_en: name,
  name_ar: name.nullable().optional(),
  description: z.string().max(2000).nullable().optional(),
  level: z.number().int().min(1).max(10).optional(),
  permission_ids: permissionIds,
});

export const replacePermissionsBody = z.object({
  permission_ids: permissionIds,
});

export const updateDetailsBody = z
  .object({
    name_en: name.optional(),
    name_ar: name.nullable().optional(),
    description: z.string().max(2000).nullable().optional(),
    level: z.number().int().min(1).max(10).optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export const bindPositionBody = z.object({
  position_id: z.string().min(1),
});

export const checkBody = z
  .object({
    permissions: z.array(z.string().min(1)).max(100),
    mode: z.enum(['single', 'all', 'any']).default('all'),
  })
  .refine((body) => body.mode !== 'single' || body.permissions.length === 1, {
    message: 'mode "single" takes exactly one permission',
    path: ['permissions'],
  });
