import type { GridLayer, LevelConfigT } from '@ledge/level-format';

/**
 * Builds an IntGrid layer from rows of characters: '.' is 0, digits are their value and any other
 * character is 1.
 */
export function gridLayer(rows: string[], cellSize = 16, identifier = 'Collision'): GridLayer {
  const width = rows[0]?.length ?? 0;
  const values: number[] = [];
  for (const row of rows) {
    for (const char of row) {
      if (char === '.') {
        values.push(0);
      } else if (/[0-9]/.test(char)) {
        values.push(Number(char));
      } else {
        values.push(1);
      }
    }
  }
  return { identifier, cellSize, width, height: rows.length, offsetX: 0, offsetY: 0, values };
}

function ldtkLayer(layer: GridLayer) {
  return {
    __identifier: layer.identifier,
    __type: 'IntGrid',
    __cWid: layer.width,
    __cHei: layer.height,
    __gridSize: layer.cellSize,
    __pxTotalOffsetX: layer.offsetX,
    __pxTotalOffsetY: layer.offsetY,
    intGridCsv: [...layer.values],
  };
}

/** Minimal LDtk project JSON holding one level with the given IntGrid layers. */
export function ldtkProject(layers: GridLayer[], levelIdentifier = 'Level_0') {
  const first = layers[0];
  return {
    jsonVersion: '1.5.3',
    defaultGridSize: first?.cellSize ?? 16,
    levels: [
      {
        identifier: levelIdentifier,
        iid: `${levelIdentifier.toLowerCase()}-iid`,
        worldX: 0,
        worldY: 0,
        pxWid: first ? first.width * first.cellSize : 0,
        pxHei: first ? first.height * first.cellSize : 0,
        layerInstances: layers.map(ldtkLayer),
      },
    ],
  };
}

export function levelConfig(overrides: Partial<LevelConfigT> = {}): LevelConfigT {
  return {
    id: 'test',
    source: 'levels/test.ldtk',
    level: 'Level_0',
    collisionLayer: 'Collision',
    start: { x: 0, y: 0 },
    ...overrides,
  };
}
