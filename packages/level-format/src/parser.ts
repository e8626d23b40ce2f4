import { LevelFormatError } from './errors';
import { type GridLayer, validateGridLayer } from './grid';
import { LdtkProject, type LdtkLayerT, type LdtkLevelT } from './schema';

export interface ParseOptions {
  /** LDtk level identifier to extract. */
  level: string;
  /** IntGrid layer that must be present for the level to be playable. */
  collisionLayer: string;
}

export interface ParsedLevel {
  identifier: string;
  iid: string;
  worldX: number;
  worldY: number;
  pxWidth: number;
  pxHeight: number;
  layers: GridLayer[];
}

function toGridLayer(layer: LdtkLayerT): GridLayer {
  const grid: GridLayer = {
    identifier: layer.__identifier,
    cellSize: layer.__gridSize,
    width: layer.__cWid,
    height: layer.__cHei,
    offsetX: layer.__pxTotalOffsetX,
    offsetY: layer.__pxTotalOffsetY,
    values: Object.freeze([...layer.intGridCsv]),
  };
  validateGridLayer(grid);
  return grid;
}

function selectLevel(levels: LdtkLevelT[], identifier: string): LdtkLevelT {
  const level = levels.find((candidate) => candidate.identifier === identifier);
  if (!level) {
    throw new LevelFormatError('MissingLevel', `Level "${identifier}" is not defined in the project`, {
      level: identifier,
      available: levels.map((candidate) => candidate.identifier),
    });
  }
  return level;
}

export function parseLevelFile(raw: unknown, options: ParseOptions): ParsedLevel {
  const parsed = LdtkProject.safeParse(raw);
  if (!parsed.success) {
    throw new LevelFormatError('MalformedLevelFile', 'Level file does not match the LDtk project format', {
      issues: parsed.error.issues,
    });
  }

  const level = selectLevel(parsed.data.levels, options.level);
  if (level.layerInstances === null) {
    throw new LevelFormatError(
      'MalformedLevelFile',
      `Level "${level.identifier}" stores its layers externally (${level.externalRelPath ?? 'unknown path'})`,
      { level: level.identifier },
    );
  }

  const intGrids = level.layerInstances.filter((layer) => layer.__type === 'IntGrid');
  if (!intGrids.some((layer) => layer.__identifier === options.collisionLayer)) {
    throw new LevelFormatError(
      'MissingLayer',
      `Level "${level.identifier}" has no IntGrid layer named "${options.collisionLayer}"`,
      { level: level.identifier, layer: options.collisionLayer, available: intGrids.map((layer) => layer.__identifier) },
    );
  }

  // Every layer is converted before anything is returned, so a bad layer fails the whole parse.
  const layers = intGrids.map(toGridLayer);

  return {
    identifier: level.identifier,
    iid: level.iid,
    worldX: level.worldX,
    worldY: level.worldY,
    pxWidth: level.pxWid,
    pxHeight: level.pxHei,
    layers,
  };
}

export function parseLevelText(text: string, options: ParseOptions): ParsedLevel {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new LevelFormatError('MalformedLevelFile', 'Level file is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseLevelFile(raw, options);
}

export function findLayer(level: ParsedLevel, identifier: string): GridLayer | null {
  return level.layers.find((layer) => layer.identifier === identifier) ?? null;
}
