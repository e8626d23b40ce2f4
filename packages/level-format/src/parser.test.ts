import { describe, expect, it } from 'vitest';

import { LevelFormatError, isLevelFormatError } from './errors';
import { cellValue } from './grid';
import { findLayer, parseLevelFile, parseLevelText } from './parser';

function layerInstance(identifier: string, type: string, width: number, height: number, values: number[] = []) {
  return {
    __identifier: identifier,
    __type: type,
    __cWid: width,
    __cHei: height,
    __gridSize: 16,
    __pxTotalOffsetX: 0,
    __pxTotalOffsetY: 0,
    intGridCsv: values,
  };
}

function intGrid(identifier: string, width: number, height: number, values: number[], gridSize = 16) {
  return { ...layerInstance(identifier, 'IntGrid', width, height, values), __gridSize: gridSize };
}

function project(layers: unknown[] | null, identifier = 'Level_0') {
  return {
    jsonVersion: '1.5.3',
    defaultGridSize: 16,
    levels: [
      {
        identifier,
        iid: 'a1b2c3d4-0000-0000-0000-000000000000',
        worldX: 0,
        worldY: 0,
        pxWid: 48,
        pxHei: 32,
        layerInstances: layers,
      },
    ],
  };
}

const options = { level: 'Level_0', collisionLayer: 'Collision' };

function captureError(run: () => unknown): LevelFormatError {
  try {
    run();
  } catch (error) {
    if (error instanceof LevelFormatError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a LevelFormatError');
}

describe('parseLevelFile', () => {
  it('extracts every IntGrid layer in file order', () => {
    const parsed = parseLevelFile(
      project([
        intGrid('Triggers', 3, 2, [0, 0, 2, 0, 0, 0]),
        layerInstance('Entities', 'Entities', 3, 2),
        intGrid('Collision', 3, 2, [0, 0, 0, 1, 1, 1]),
      ]),
      options,
    );

    expect(parsed.identifier).toBe('Level_0');
    expect(parsed.pxWidth).toBe(48);
    expect(parsed.layers.map((layer) => layer.identifier)).toEqual(['Triggers', 'Collision']);

    const collision = findLayer(parsed, 'Collision');
    expect(collision).not.toBeNull();
    expect(collision?.width).toBe(3);
    expect(collision?.height).toBe(2);
    expect(collision?.cellSize).toBe(16);
  });

  it('addresses cells row-major and rejects out-of-range coordinates', () => {
    const parsed = parseLevelFile(project([intGrid('Collision', 3, 2, [0, 0, 7, 1, 0, 0])]), options);
    const [layer] = parsed.layers;

    expect(cellValue(layer, 2, 0)).toBe(7);
    expect(cellValue(layer, 0, 1)).toBe(1);
    expect(() => cellValue(layer, 3, 0)).toThrow(RangeError);
    expect(() => cellValue(layer, 0, -1)).toThrow(RangeError);
  });

  it('is a pure function of its input', () => {
    const raw = project([intGrid('Collision', 2, 1, [1, 0])]);
    expect(parseLevelFile(raw, options)).toEqual(parseLevelFile(raw, options));
  });

  it('reports a missing collision layer', () => {
    const error = captureError(() => parseLevelFile(project([intGrid('Walls', 2, 1, [1, 0])]), options));
    expect(error.code).toBe('MissingLayer');
    expect(error.details).toEqual({ level: 'Level_0', layer: 'Collision', available: ['Walls'] });
  });

  it('does not accept a non-IntGrid layer as the collision layer', () => {
    const error = captureError(() =>
      parseLevelFile(project([layerInstance('Collision', 'Tiles', 2, 1)]), options),
    );
    expect(error.code).toBe('MissingLayer');
  });

  it('reports an IntGrid layer without its value array as malformed', () => {
    const { intGridCsv: _values, ...withoutValues } = intGrid('Collision', 2, 1, [1, 0]);
    const error = captureError(() => parseLevelFile(project([withoutValues]), options));
    expect(error.code).toBe('MalformedLevelFile');
  });

  it('reports missing layer offsets and level coordinates as malformed', () => {
    const { __pxTotalOffsetX: _offset, ...withoutOffset } = intGrid('Collision', 2, 1, [1, 0]);
    expect(captureError(() => parseLevelFile(project([withoutOffset]), options)).code).toBe('MalformedLevelFile');

    const raw = project([intGrid('Collision', 2, 1, [1, 0])]);
    const { worldX: _worldX, ...level } = raw.levels[0];
    expect(captureError(() => parseLevelFile({ ...raw, levels: [level] }, options)).code).toBe('MalformedLevelFile');
  });

  it('reports a level identifier that is not in the project', () => {
    const error = captureError(() => parseLevelFile(project([intGrid('Collision', 1, 1, [1])], 'Level_9'), options));
    expect(error.code).toBe('MissingLevel');
  });

  it.each([
    ['zero cell size', intGrid('Collision', 2, 1, [1, 0], 0)],
    ['fractional cell size', intGrid('Collision', 2, 1, [1, 0], 15.5)],
    ['zero width', intGrid('Collision', 0, 1, [])],
    ['negative height', intGrid('Collision', 2, -1, [1, 0])],
    ['short cell array', intGrid('Collision', 2, 2, [1, 0, 1])],
  ])('rejects %s as UnsupportedDimensions', (_label, layer) => {
    const error = captureError(() => parseLevelFile(project([layer]), options));
    expect(error.code).toBe('UnsupportedDimensions');
  });

  it('fails the whole parse when any IntGrid layer is malformed', () => {
    const error = captureError(() =>
      parseLevelFile(
        project([intGrid('Collision', 2, 1, [1, 0]), intGrid('Triggers', 2, 1, [0])]),
        options,
      ),
    );
    expect(error.code).toBe('UnsupportedDimensions');
    expect(error.details).toEqual({ layer: 'Triggers', expected: 2, actual: 1 });
  });

  it('rejects structurally invalid files', () => {
    expect(isLevelFormatError(captureError(() => parseLevelFile({ levels: 'nope' }, options)), 'MalformedLevelFile')).toBe(
      true,
    );
    expect(captureError(() => parseLevelFile(null, options)).code).toBe('MalformedLevelFile');
  });

  it('rejects levels whose layers live in separate files', () => {
    const error = captureError(() => parseLevelFile(project(null), options));
    expect(error.code).toBe('MalformedLevelFile');
  });
});

describe('parseLevelText', () => {
  it('parses JSON text', () => {
    const text = JSON.stringify(project([intGrid('Collision', 1, 1, [1])]));
    expect(parseLevelText(text, options).layers).toHaveLength(1);
  });

  it('reports invalid JSON as MalformedLevelFile', () => {
    expect(captureError(() => parseLevelText('{"levels": [', options)).code).toBe('MalformedLevelFile');
  });
});
