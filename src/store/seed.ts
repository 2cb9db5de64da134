import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { PositionRegistry } from '../authz/position-registry.js';
import type { Position } from '../authz/types.js';

const positionDefinitionSchema = z.object({
  name_en: z.string().min(1),
  name_ar: z.string().min(1).nullable().optional(),
  description: z.string().nullable().optional(),
  level: z.number().int().min(1).max(10).optional(),
  full_catalog: z.boolean().optional(),
  permission_ids: z.array(z.string()).default([]),
});

const positionsFileSchema = z.object({
  positions: z.array(positionDefinitionSchema),
});

export type PositionDefinition = z.infer<typeof positionDefinitionSchema>;

export function loadPositionDefinitions(path: string): PositionDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return positionsFileSchema.parse(raw).positions;
}

export interface SeedResult {
  created: Position[];
  existing: Position[];
}

/**
 * Installs the default positions. Positions are matched by English name, the
 * full-catalog one by its flag; anything already present is left untouched.
 */
export async function seedPositions(
  registry: PositionRegistry,
  definitions: PositionDefinition[],
): Promise<SeedResult> {
  const result: SeedResult = { created: [], existing: [] };
  const current = await registry.listAll();
  const byName = new Map(current.map((p) => [p.name_en.toLocaleLowerCase(), p]));

  for (const def of definitions) {
    if (def.full_catalog) {
      const hadAdmin = current.some((p) => p.is_full_catalog_grant);
      const admin = await registry.ensureSystemAdministrator(def);
      (hadAdmin ? result.existing : result.created).push(admin);
      continue;
    }

    const existing = byName.get(def.name_en.toLocaleLowerCase());
    if (existing) {
      result.existing.push(existing);
      continue;
    }

    result.created.push(
      await registry.create({
        name_en: def.name_en,
        name_ar: def.name_ar,
        description: def.description,
        level: def.level,
        permission_ids: def.permission_ids,
      }),
    );
  }

  return result;
}
