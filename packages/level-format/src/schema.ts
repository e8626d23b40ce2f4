import { z } from 'zod';

// Subset of the LDtk project JSON the runtime reads. LDtk writes every field below on every layer
// (intGridCsv is empty outside IntGrid layers), so none of them is defaulted. Dimension fields are
// left unconstrained here so the parser can report them as UnsupportedDimensions.
const LayerInstance = z.object({
  __identifier: z.string(),
  __type: z.enum(['IntGrid', 'Entities', 'Tiles', 'AutoLayer']),
  __cWid: z.number(),
  __cHei: z.number(),
  __gridSize: z.number(),
  __pxTotalOffsetX: z.number(),
  __pxTotalOffsetY: z.number(),
  intGridCsv: z.array(z.number().int()),
});

const LdtkLevel = z.object({
  identifier: z.string(),
  iid: z.string(),
  worldX: z.number(),
  worldY: z.number(),
  pxWid: z.number(),
  pxHei: z.number(),
  layerInstances: z.array(LayerInstance).nullable(),
  externalRelPath: z.string().nullable().optional(),
});

export const LdtkProject = z.object({
  jsonVersion: z.string().optional(),
  defaultGridSize: z.number().optional(),
  levels: z.array(LdtkLevel),
});

const Point = z.object({
  x: z.number(),
  y: z.number(),
});

export const LevelConfig = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  level: z.string().min(1),
  collisionLayer: z.string().min(1),
  triggerLayer: z.string().min(1).optional(),
  start: Point,
  next: z.string().min(1).optional(),
});

export const LevelCatalog = z
  .object({
    start: z.string().min(1),
    levels: z.array(LevelConfig).min(1),
  })
  .superRefine((catalog, ctx) => {
    const ids = new Set<string>();
    catalog.levels.forEach((level, index) => {
      if (ids.has(level.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', index, 'id'],
          message: `Duplicate level id "${level.id}"`,
        });
      }
      ids.add(level.id);
    });

    if (!ids.has(catalog.start)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['start'],
        message: `Start level "${catalog.start}" is not in the catalog`,
      });
    }

    catalog.levels.forEach((level, index) => {
      if (level.next && !ids.has(level.next)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['levels', index, 'next'],
          message: `Next level "${level.next}" is not in the catalog`,
        });
      }
    });
  });

export type LdtkProjectT = z.infer<typeof LdtkProject>;
export type LdtkLevelT = z.infer<typeof LdtkLevel>;
export type LdtkLayerT = z.infer<typeof LayerInstance>;
export type LevelConfigT = z.infer<typeof LevelConfig>;
export type LevelCatalogT = z.infer<typeof LevelCatalog>;
export type PointT = z.infer<typeof Point>;
