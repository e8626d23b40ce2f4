import type { MovementParams } from '@ledge/tuning';

import type { Rect, Vec2 } from '../collision/map';

/**
 * Kinematic state of one actor. Position is the top-left corner of its box in world pixels with y
 * growing downward; velocities are pixels per second. Only the movement resolver writes it.
 */
export interface KinematicBody {
  id: string;
  x: number;
  y: number;
  vx: number;
  vy: number;
  halfWidth: number;
  halfHeight: number;
  grounded: boolean;
  coyoteMs: number;
  jumpBufferMs: number;
  params: MovementParams;
}

export interface SpawnSpec {
  x: number;
  y: number;
  halfWidth: number;
  halfHeight: number;
}

export function spawnBody(id: string, at: SpawnSpec, params: MovementParams): KinematicBody {
  const body: KinematicBody = {
    id,
    x: at.x,
    y: at.y,
    vx: 0,
    vy: 0,
    halfWidth: at.halfWidth,
    halfHeight: at.halfHeight,
    grounded: false,
    coyoteMs: 0,
    jumpBufferMs: 0,
    params,
  };
  assertValidBody(body);
  return body;
}

export function assertValidBody(body: KinematicBody): void {
  const numbers = { x: body.x, y: body.y, vx: body.vx, vy: body.vy };
  for (const [field, value] of Object.entries(numbers)) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Body "${body.id}" has non-finite ${field}: ${value}`);
    }
  }
  if (!(body.halfWidth > 0) || !(body.halfHeight > 0) || !Number.isFinite(body.halfWidth + body.halfHeight)) {
    throw new RangeError(`Body "${body.id}" needs positive finite half extents, got ${body.halfWidth}x${body.halfHeight}`);
  }
  if (!(body.coyoteMs >= 0) || !(body.jumpBufferMs >= 0)) {
    throw new RangeError(`Body "${body.id}" has negative timers`);
  }
}

export function bodyPosition(body: KinematicBody): Vec2 {
  return { x: body.x, y: body.y };
}

export function halfExtents(body: KinematicBody): Vec2 {
  return { x: body.halfWidth, y: body.halfHeight };
}

export function bodyRect(body: KinematicBody): Rect {
  return { x: body.x, y: body.y, w: body.halfWidth * 2, h: body.halfHeight * 2 };
}
