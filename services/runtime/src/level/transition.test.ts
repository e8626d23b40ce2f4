import { describe, expect, it } from 'vitest';

import { DEFAULT_TUNING, movementParams } from '@ledge/tuning';

import { gridLayer, levelConfig } from '../../test/fixtures';
import { CollisionMap } from '../collision/map';
import { spawnBody } from '../sim/body';
import { LevelTransition, findTriggerCell } from './transition';

const next = levelConfig({ id: 'next' });

describe('LevelTransition', () => {
  it('is idle and transparent until started', () => {
    const transition = new LevelTransition();
    expect(transition.phase).toBe('idle');
    expect(transition.fadeAlpha()).toBe(0);
    expect(transition.update(0.1)).toBeNull();
  });

  it('requests the switch once, at the midpoint', () => {
    const transition = new LevelTransition(1);
    expect(transition.start(next)).toBe(true);

    expect(transition.update(0.25)).toBeNull();
    expect(transition.phase).toBe('fading_out');
    expect(transition.fadeAlpha()).toBe(0.5);

    expect(transition.update(0.25)).toBe(next);
    expect(transition.phase).toBe('fading_in');
    expect(transition.fadeAlpha()).toBe(1);

    expect(transition.update(0.25)).toBeNull();
    expect(transition.fadeAlpha()).toBe(0.5);

    expect(transition.update(0.25)).toBeNull();
    expect(transition.inProgress).toBe(false);
    expect(transition.fadeAlpha()).toBe(0);
  });

  it('refuses a second transition while one is running', () => {
    const transition = new LevelTransition();
    transition.start(next);
    expect(transition.start(levelConfig({ id: 'other' }))).toBe(false);
    expect(transition.destination).toBe(next);
  });

  it('switches and finishes within one long update', () => {
    const transition = new LevelTransition(1);
    transition.start(next);
    expect(transition.update(2)).toBe(next);
    expect(transition.inProgress).toBe(false);
  });

  it('rejects a non-positive duration', () => {
    expect(() => new LevelTransition(0)).toThrow(RangeError);
  });
});

describe('findTriggerCell', () => {
  const triggers = CollisionMap.build(gridLayer(['....', '...1'], 16, 'Triggers'));
  const params = movementParams(DEFAULT_TUNING);

  it('finds the trigger cell a body overlaps', () => {
    const body = spawnBody('player', { x: 50, y: 20, halfWidth: 4, halfHeight: 4 }, params);
    expect(findTriggerCell(triggers, body)).toEqual({ x: 3, y: 1 });
  });

  it('ignores a body that only touches the trigger cell', () => {
    const body = spawnBody('player', { x: 50, y: 8, halfWidth: 4, halfHeight: 4 }, params);
    expect(findTriggerCell(triggers, body)).toBeNull();
  });
});
