import type { LevelConfigT } from '@ledge/level-format';

import type { CellCoord, CollisionMap } from '../collision/map';
import { type KinematicBody, bodyRect } from '../sim/body';

export const DEFAULT_FADE_SECONDS = 1;

export type TransitionPhase = 'idle' | 'fading_out' | 'fading_in';

/** Trigger cell under the body, if any. */
export function findTriggerCell(triggers: CollisionMap, body: KinematicBody): CellCoord | null {
  return triggers.firstSolidIn(bodyRect(body));
}

/**
 * Fade-out / fade-in between levels. The level switch is requested once, when the fade crosses its
 * midpoint and the screen is fully covered.
 */
export class LevelTransition {
  private elapsed = 0;
  private target: LevelConfigT | null = null;
  private switchRequested = false;

  constructor(readonly durationSeconds = DEFAULT_FADE_SECONDS) {
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new RangeError(`Fade duration must be positive, got ${durationSeconds}`);
    }
  }

  get inProgress(): boolean {
    return this.target !== null;
  }

  get destination(): LevelConfigT | null {
    return this.target;
  }

  get phase(): TransitionPhase {
    if (!this.target) {
      return 'idle';
    }
    return this.elapsed < this.durationSeconds / 2 ? 'fading_out' : 'fading_in';
  }

  /** Returns false when a transition is already running. */
  start(target: LevelConfigT): boolean {
    if (this.target) {
      return false;
    }
    this.target = target;
    this.elapsed = 0;
    this.switchRequested = false;
    return true;
  }

  /** Advances the fade; returns the level to load on the update that crosses the midpoint. */
  update(dt: number): LevelConfigT | null {
    if (!this.target) {
      return null;
    }

    this.elapsed += dt;
    let switchTo: LevelConfigT | null = null;
    if (!this.switchRequested && this.elapsed >= this.durationSeconds / 2) {
      this.switchRequested = true;
      switchTo = this.target;
    }

    if (this.elapsed >= this.durationSeconds) {
      this.reset();
    }
    return switchTo;
  }

  /** 0 is transparent, 1 fully covered. */
  fadeAlpha(): number {
    if (!this.target) {
      return 0;
    }
    const half = this.durationSeconds / 2;
    if (this.elapsed < half) {
      return this.elapsed / half;
    }
    return Math.max(0, 1 - (this.elapsed - half) / half);
  }

  reset(): void {
    this.target = null;
    this.elapsed = 0;
    this.switchRequested = false;
  }
}
