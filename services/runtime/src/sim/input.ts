/** One input sample for one body: a horizontal axis and a jump edge trigger. */
export interface InputSample {
  axis: number;
  jumpPressed: boolean;
}

export const NEUTRAL_INPUT: Readonly<InputSample> = Object.freeze({ axis: 0, jumpPressed: false });

export function sanitizeInput(sample: InputSample): InputSample {
  if (!Number.isFinite(sample.axis)) {
    throw new RangeError(`Input axis must be finite, got ${sample.axis}`);
  }
  return {
    axis: Math.max(-1, Math.min(1, sample.axis)),
    jumpPressed: sample.jumpPressed,
  };
}
