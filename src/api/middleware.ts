import { Request, Response, NextFunction } from 'express';

/**
 * Error handler wrapper
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

export interface CueReference {
  subtitlePath: string;
  cueIndex: number;
}

/**
 * Reads { subtitlePath, cueIndex } from a request body
 * @returns null when either field is missing or of the wrong type
 */
export function readCueReference(body: unknown): CueReference | null {
  if (typeof body !== 'object' || body === null) return null;
  if (!('subtitlePath' in body) || !('cueIndex' in body)) return null;

  const { subtitlePath, cueIndex } = body;
  if (typeof subtitlePath !== 'string' || !subtitlePath) return null;
  if (typeof cueIndex !== 'number' || !Number.isInteger(cueIndex)) return null;

  return { subtitlePath, cueIndex };
}

/**
 * Reads a single string query parameter, ignoring repeated or nested values
 */
export function readQueryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}
