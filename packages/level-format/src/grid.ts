import { LevelFormatError } from './errors';

/** One IntGrid layer, row-major: the value of cell (x, y) lives at `y * width + x`. */
export interface GridLayer {
  identifier: string;
  cellSize: number;
  width: number;
  height: number;
  offsetX: number;
  offsetY: number;
  values: readonly number[];
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateGridLayer(layer: GridLayer): void {
  const { identifier, cellSize, width, height, values } = layer;
  if (!isPositiveInteger(cellSize)) {
    throw new LevelFormatError('UnsupportedDimensions', `Layer "${identifier}" has invalid cell size ${cellSize}`, {
      layer: identifier,
      cellSize,
    });
  }
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new LevelFormatError(
      'UnsupportedDimensions',
      `Layer "${identifier}" has invalid grid size ${width}x${height}`,
      { layer: identifier, width, height },
    );
  }
  if (values.length !== width * height) {
    throw new LevelFormatError(
      'UnsupportedDimensions',
      `Layer "${identifier}" holds ${values.length} cells, expected ${width * height}`,
      { layer: identifier, expected: width * height, actual: values.length },
    );
  }
}

export function inGridBounds(layer: Pick<GridLayer, 'width' | 'height'>, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < layer.width && y < layer.height;
}

export function cellValue(layer: GridLayer, x: number, y: number): number {
  if (!inGridBounds(layer, x, y)) {
    throw new RangeError(`Cell (${x}, ${y}) is outside layer "${layer.identifier}" (${layer.width}x${layer.height})`);
  }
  return layer.values[y * layer.width + x];
}
