/**
 * Raised when a subtitle file contains no recognizable cue at all
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly subtitlePath: string | null = null,
    public readonly skippedBlocks: number = 0
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Raised when a subtitle file cannot be read from disk
 */
export class SubtitleReadError extends Error {
  constructor(
    public readonly subtitlePath: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read subtitle file ${subtitlePath}: ${reason}`, { cause });
    this.name = 'SubtitleReadError';
  }
}
