/**
 * Fixed-timestep accumulator. Real frame time is banked and drained in whole steps, so simulation
 * speed does not depend on the frame rate. Frames longer than `maxFrameSeconds` are clamped to
 * keep a stall from queuing an unbounded burst of steps.
 */
export class FixedStepLoop {
  private accumulator = 0;
  private ticks = 0;

  constructor(
    readonly stepSeconds: number,
    readonly maxFrameSeconds: number,
  ) {
    if (!Number.isFinite(stepSeconds) || stepSeconds <= 0) {
      throw new RangeError(`Step duration must be positive, got ${stepSeconds}`);
    }
    if (!Number.isFinite(maxFrameSeconds) || maxFrameSeconds < stepSeconds) {
      throw new RangeError(`Max frame time must be at least one step, got ${maxFrameSeconds}`);
    }
  }

  /** Number of steps run so far. */
  get tick(): number {
    return this.ticks;
  }

  /** Fraction of a step left in the accumulator, for render interpolation. */
  get alpha(): number {
    return this.accumulator / this.stepSeconds;
  }

  /** Banks `frameSeconds` and calls `onStep` once per whole step; returns the number of steps run. */
  advance(frameSeconds: number, onStep: (tick: number, dt: number) => void): number {
    if (!Number.isFinite(frameSeconds) || frameSeconds < 0) {
      throw new RangeError(`Frame time must be a non-negative number, got ${frameSeconds}`);
    }

    this.accumulator += Math.min(frameSeconds, this.maxFrameSeconds);

    let steps = 0;
    while (this.accumulator >= this.stepSeconds) {
      onStep(this.ticks, this.stepSeconds);
      this.ticks += 1;
      this.accumulator -= this.stepSeconds;
      steps += 1;
    }
    return steps;
  }

  /** Runs exactly one step, leaving the accumulator alone. */
  step(onStep: (tick: number, dt: number) => void): void {
    onStep(this.ticks, this.stepSeconds);
    this.ticks += 1;
  }

  reset(): void {
    this.accumulator = 0;
  }
}
