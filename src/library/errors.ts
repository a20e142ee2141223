export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The subtitle exists but was not paired with any video, so it cannot be played
 */
export class NoVideoMatchError extends Error {
  constructor(public readonly subtitlePath: string) {
    super(`No matching video file found for ${subtitlePath}`);
    this.name = 'NoVideoMatchError';
  }
}
