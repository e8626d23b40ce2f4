export type LevelFormatErrorCode =
  | 'MalformedLevelFile'
  | 'MissingLevel'
  | 'MissingLayer'
  | 'UnsupportedDimensions';

export class LevelFormatError extends Error {
  constructor(
    public readonly code: LevelFormatErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'LevelFormatError';
  }
}

export function isLevelFormatError(error: unknown, code?: LevelFormatErrorCode): error is LevelFormatError {
  if (!(error instanceof LevelFormatError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
