import { type GridLayer, validateGridLayer } from '@ledge/level-format';

export type Axis = 'x' | 'y';

export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface CellCoord {
  x: number;
  y: number;
}

export interface SweepResult {
  displacement: number;
  hit: CellCoord | null;
}

// Tolerance for float drift at cell faces; boxes closer than this to a face count as flush.
const EDGE_EPSILON = 1e-6;

interface AxisFrame {
  origin: number;
  count: number;
}

/**
 * Solidity lookup for one level, built from a single IntGrid layer: a cell is solid iff its source
 * value is non-zero. Instances are never mutated; a level change builds a new map.
 *
 * World coordinates map to cells by `floor((w - origin) / cellSize)`. Positions passed to the box
 * queries are top-left corners with y growing downward.
 */
export class CollisionMap {
  private constructor(
    readonly layerId: string,
    readonly cellSize: number,
    readonly width: number,
    readonly height: number,
    readonly originX: number,
    readonly originY: number,
    readonly solidCount: number,
    private readonly bits: Uint32Array,
  ) {}

  static build(layer: GridLayer): CollisionMap {
    validateGridLayer(layer);

    const bits = new Uint32Array(Math.ceil(layer.values.length / 32));
    let solidCount = 0;
    layer.values.forEach((value, index) => {
      if (value !== 0) {
        bits[index >>> 5] |= 1 << (index & 31);
        solidCount += 1;
      }
    });

    return new CollisionMap(
      layer.identifier,
      layer.cellSize,
      layer.width,
      layer.height,
      layer.offsetX,
      layer.offsetY,
      solidCount,
      bits,
    );
  }

  /** Out-of-grid cells are open. */
  isSolid(cellX: number, cellY: number): boolean {
    if (!Number.isInteger(cellX) || !Number.isInteger(cellY)) {
      return false;
    }
    if (cellX < 0 || cellY < 0 || cellX >= this.width || cellY >= this.height) {
      return false;
    }
    const index = cellY * this.width + cellX;
    return ((this.bits[index >>> 5] >>> (index & 31)) & 1) === 1;
  }

  cellX(worldX: number): number {
    return Math.floor((worldX - this.originX) / this.cellSize);
  }

  cellY(worldY: number): number {
    return Math.floor((worldY - this.originY) / this.cellSize);
  }

  cellAt(worldX: number, worldY: number): CellCoord {
    return { x: this.cellX(worldX), y: this.cellY(worldY) };
  }

  cellOrigin(cellX: number, cellY: number): Vec2 {
    return { x: this.originX + cellX * this.cellSize, y: this.originY + cellY * this.cellSize };
  }

  /** First solid cell overlapped by the rectangle, scanning rows top to bottom. Touching edges don't overlap. */
  firstSolidIn(rect: Rect): CellCoord | null {
    const [firstCol, lastCol] = this.clip(this.span(rect.x, rect.x + rect.w, this.frame('x')), this.width);
    const [firstRow, lastRow] = this.clip(this.span(rect.y, rect.y + rect.h, this.frame('y')), this.height);

    for (let row = firstRow; row <= lastRow; row += 1) {
      for (let col = firstCol; col <= lastCol; col += 1) {
        if (this.isSolid(col, row)) {
          return { x: col, y: row };
        }
      }
    }
    return null;
  }

  overlapsSolid(rect: Rect): boolean {
    return this.firstSolidIn(rect) !== null;
  }

  /**
   * Moves a box along one axis and returns how far it may travel before its leading edge enters a
   * solid cell. Cells are visited in order from the current footprint to the target footprint, so
   * no cell is skipped however large the displacement. A leading edge that ends exactly on a cell
   * face does not enter that cell.
   */
  sweepAABB(position: Vec2, halfExtents: Vec2, displacement: number, axis: Axis): SweepResult {
    if (displacement === 0) {
      return { displacement: 0, hit: null };
    }

    const across: Axis = axis === 'x' ? 'y' : 'x';
    const acrossMin = position[across];
    const acrossMax = acrossMin + halfExtents[across] * 2;
    const acrossFrame = this.frame(across);
    const [firstLane, lastLane] = this.clip(this.span(acrossMin, acrossMax, acrossFrame), acrossFrame.count);
    if (firstLane > lastLane) {
      return { displacement, hit: null };
    }

    const along = this.frame(axis);
    const size = this.cellSize;
    const cellFor = (lane: number, step: number): CellCoord =>
      axis === 'x' ? { x: step, y: lane } : { x: lane, y: step };

    if (displacement > 0) {
      const edge = position[axis] + halfExtents[axis] * 2;
      const target = edge + displacement;
      const first = Math.max(0, Math.ceil((edge - along.origin - EDGE_EPSILON) / size));
      const last = Math.min(along.count - 1, Math.ceil((target - along.origin) / size) - 1);

      for (let step = first; step <= last; step += 1) {
        for (let lane = firstLane; lane <= lastLane; lane += 1) {
          const cell = cellFor(lane, step);
          if (this.isSolid(cell.x, cell.y)) {
            const face = along.origin + step * size;
            return { displacement: Math.min(displacement, Math.max(0, face - edge)), hit: cell };
          }
        }
      }
      return { displacement, hit: null };
    }

    const edge = position[axis];
    const target = edge + displacement;
    const first = Math.min(along.count - 1, Math.floor((edge - along.origin + EDGE_EPSILON) / size) - 1);
    const last = Math.max(0, Math.floor((target - along.origin) / size));

    for (let step = first; step >= last; step -= 1) {
      for (let lane = firstLane; lane <= lastLane; lane += 1) {
        const cell = cellFor(lane, step);
        if (this.isSolid(cell.x, cell.y)) {
          const face = along.origin + (step + 1) * size;
          return { displacement: Math.max(displacement, Math.min(0, face - edge)), hit: cell };
        }
      }
    }
    return { displacement, hit: null };
  }

  private frame(axis: Axis): AxisFrame {
    return axis === 'x'
      ? { origin: this.originX, count: this.width }
      : { origin: this.originY, count: this.height };
  }

  /** Cells covered by the open interval (min, max), shrunk by the edge tolerance. */
  private span(min: number, max: number, frame: AxisFrame): [number, number] {
    const first = Math.floor((min - frame.origin + EDGE_EPSILON) / this.cellSize);
    const last = Math.ceil((max - frame.origin - EDGE_EPSILON) / this.cellSize) - 1;
    if (first > last) {
      const center = Math.floor(((min + max) / 2 - frame.origin) / this.cellSize);
      return [center, center];
    }
    return [first, last];
  }

  private clip([first, last]: [number, number], count: number): [number, number] {
    return [Math.max(0, first), Math.min(count - 1, last)];
  }
}
