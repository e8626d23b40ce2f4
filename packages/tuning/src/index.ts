import { z } from 'zod';

/**
 * Gameplay tuning in world units (1 unit = 1 LDtk pixel, y grows downward). Values are large
 * because sprites are small: max speed is reached in a fraction of a second.
 */
export const DEFAULT_TUNING = {
  stepHz: 60,
  maxFrameSeconds: 0.25,
  gravity: 1150,
  terminalVelocity: 1800,
  groundAccel: 1600,
  airAccel: 1200,
  groundMaxSpeed: 325,
  airMaxSpeed: 275,
  jumpSpeed: 480,
  coyoteMs: 90,
  jumpBufferMs: 100,
} as const;

const positive = z.number().finite().gt(0);
const nonNegative = z.number().finite().min(0);

const TuningSchema = z.object({
  stepHz: z.number().int().gt(0).max(1000),
  maxFrameSeconds: positive,
  gravity: nonNegative,
  terminalVelocity: positive,
  groundAccel: positive,
  airAccel: positive,
  groundMaxSpeed: nonNegative,
  airMaxSpeed: nonNegative,
  jumpSpeed: nonNegative,
  coyoteMs: nonNegative,
  jumpBufferMs: nonNegative,
});

export type MovementTuning = z.infer<typeof TuningSchema>;

/** The per-body slice of the tuning; actors differ from the player by these values only. */
export type MovementParams = Omit<MovementTuning, 'stepHz' | 'maxFrameSeconds'>;

export type TuningOverrides = {
  [K in keyof MovementTuning]?: number | null | undefined;
};

export function resolveMovementTuning(overrides: TuningOverrides = {}): MovementTuning {
  const merged: Record<string, number> = { ...DEFAULT_TUNING };
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'number') {
      merged[key] = value;
    }
  }
  return TuningSchema.parse(merged);
}

export function movementParams(tuning: MovementTuning): MovementParams {
  const { stepHz: _stepHz, maxFrameSeconds: _maxFrameSeconds, ...params } = tuning;
  return params;
}

export function stepSeconds(tuning: Pick<MovementTuning, 'stepHz'>): number {
  return 1 / tuning.stepHz;
}

/** Window length expressed in whole simulation steps, rounded up. */
export function windowSteps(windowMs: number, tuning: Pick<MovementTuning, 'stepHz'>): number {
  return Math.ceil((windowMs / 1000) * tuning.stepHz - 1e-9);
}
