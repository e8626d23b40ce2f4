import { describe, expect, it } from 'vitest';

import { DEFAULT_TUNING, movementParams } from '@ledge/tuning';

import { assertValidBody, bodyRect, spawnBody } from './body';
import { NEUTRAL_INPUT, sanitizeInput } from './input';

const params = movementParams(DEFAULT_TUNING);

describe('spawnBody', () => {
  it('starts at rest and airborne', () => {
    const body = spawnBody('player', { x: 10, y: 20, halfWidth: 6, halfHeight: 8 }, params);
    expect(body).toMatchObject({ id: 'player', x: 10, y: 20, vx: 0, vy: 0, grounded: false, coyoteMs: 0, jumpBufferMs: 0 });
    expect(bodyRect(body)).toEqual({ x: 10, y: 20, w: 12, h: 16 });
  });

  it('rejects non-finite positions and empty boxes', () => {
    expect(() => spawnBody('a', { x: Number.NaN, y: 0, halfWidth: 1, halfHeight: 1 }, params)).toThrow(
      'Body "a" has non-finite x: NaN',
    );
    expect(() => spawnBody('b', { x: 0, y: 0, halfWidth: 0, halfHeight: 1 }, params)).toThrow(RangeError);
    expect(() => spawnBody('c', { x: 0, y: 0, halfWidth: 1, halfHeight: Number.POSITIVE_INFINITY }, params)).toThrow(
      RangeError,
    );
  });

  it('rejects negative timers', () => {
    const body = { ...spawnBody('d', { x: 0, y: 0, halfWidth: 1, halfHeight: 1 }, params), coyoteMs: -1 };
    expect(() => assertValidBody(body)).toThrow('Body "d" has negative timers');
  });
});

describe('sanitizeInput', () => {
  it('clamps the axis and keeps the jump edge', () => {
    expect(sanitizeInput({ axis: -3, jumpPressed: true })).toEqual({ axis: -1, jumpPressed: true });
    expect(sanitizeInput(NEUTRAL_INPUT)).toEqual({ axis: 0, jumpPressed: false });
  });

  it('rejects a non-finite axis', () => {
    expect(() => sanitizeInput({ axis: Number.POSITIVE_INFINITY, jumpPressed: false })).toThrow(RangeError);
  });
});
