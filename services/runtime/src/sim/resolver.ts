import type { CollisionMap } from '../collision/map';
import { type KinematicBody, assertValidBody, bodyPosition, halfExtents } from './body';
import type { MovementEvent, MovementEventType } from './events';
import { type InputSample, sanitizeInput } from './input';

/** Distance below the feet that still counts as standing on a cell. */
export const GROUND_PROBE_PX = 0.01;

export interface StepResult {
  body: KinematicBody;
  events: MovementEvent[];
}

function moveTowards(current: number, target: number, maxDelta: number): number {
  const delta = target - current;
  if (Math.abs(delta) <= maxDelta) {
    return target;
  }
  return current + Math.sign(delta) * maxDelta;
}

export function hasGroundBelow(map: CollisionMap, body: KinematicBody): boolean {
  return map.sweepAABB(bodyPosition(body), halfExtents(body), GROUND_PROBE_PX, 'y').hit !== null;
}

/**
 * Advances one body by one fixed step against `map` and returns the new state; the input body is
 * not modified. Order: jump buffering, horizontal steering, jump, gravity, x sweep, y sweep from
 * the resolved x, then timers.
 */
export function stepBody(
  body: KinematicBody,
  input: InputSample,
  map: CollisionMap,
  dt: number,
  tick: number,
): StepResult {
  assertValidBody(body);
  if (!Number.isFinite(dt) || dt <= 0) {
    throw new RangeError(`Step duration must be positive, got ${dt}`);
  }

  const sample = sanitizeInput(input);
  const params = body.params;
  const dtMs = dt * 1000;
  const next: KinematicBody = { ...body };
  const happened: MovementEventType[] = [];

  if (sample.jumpPressed) {
    next.jumpBufferMs = params.jumpBufferMs;
  }

  const accel = next.grounded ? params.groundAccel : params.airAccel;
  const maxSpeed = next.grounded ? params.groundMaxSpeed : params.airMaxSpeed;
  next.vx = moveTowards(next.vx, sample.axis * maxSpeed, accel * dt);

  let jumped = false;
  if (next.jumpBufferMs > 0 && (next.grounded || next.coyoteMs > 0)) {
    next.vy = -params.jumpSpeed;
    next.grounded = false;
    next.coyoteMs = 0;
    next.jumpBufferMs = 0;
    jumped = true;
    happened.push('jumped');
  }

  if (!next.grounded) {
    next.vy = Math.min(next.vy + params.gravity * dt, params.terminalVelocity);
  }

  const horizontal = map.sweepAABB(bodyPosition(next), halfExtents(next), next.vx * dt, 'x');
  next.x += horizontal.displacement;
  if (horizontal.hit) {
    // Only the step that stops the body reports; pushing against a wall already touched is silent.
    if (horizontal.displacement !== 0 || body.vx !== 0) {
      happened.push('wall_hit');
    }
    next.vx = 0;
  }

  const dy = next.vy * dt;
  if (dy > 0) {
    const vertical = map.sweepAABB(bodyPosition(next), halfExtents(next), dy, 'y');
    next.y += vertical.displacement;
    if (vertical.hit) {
      next.vy = 0;
      next.grounded = true;
    } else {
      next.grounded = false;
    }
  } else if (dy < 0) {
    const vertical = map.sweepAABB(bodyPosition(next), halfExtents(next), dy, 'y');
    next.y += vertical.displacement;
    if (vertical.hit) {
      next.vy = 0;
      happened.push('head_bump');
    }
  } else {
    next.grounded = hasGroundBelow(map, next);
  }

  if (next.grounded && !body.grounded) {
    happened.push('landed');
  } else if (!next.grounded && body.grounded && !jumped) {
    happened.push('left_ground');
  }

  next.coyoteMs = next.grounded ? params.coyoteMs : Math.max(0, next.coyoteMs - dtMs);
  next.jumpBufferMs = Math.max(0, next.jumpBufferMs - dtMs);

  const events = happened.map((type) => ({ type, bodyId: next.id, tick, x: next.x, y: next.y }));
  return { body: next, events };
}
