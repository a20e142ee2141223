import { NormalizedName } from './types';
import { DEFAULT_NOISE_TOKENS, DEFAULT_SUBTITLE_EXTENSIONS, DEFAULT_VIDEO_EXTENSIONS } from '../config';

export interface NormalizeOptions {
  /** Extensions stripped from the end of the name, lower-case with leading dot */
  extensions?: string[];
  /** Tokens dropped from the name, lower-case */
  noiseTokens?: string[];
}

const SEPARATORS = /[\s\-_.()[\]{}]+/;

const DEFAULT_EXTENSIONS = [...DEFAULT_SUBTITLE_EXTENSIONS, ...DEFAULT_VIDEO_EXTENSIONS];

/**
 * Returns the last path segment, accepting both / and \ separators
 */
export function baseName(filePath: string): string {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? filePath;
}

/**
 * Strips known extensions from the end of a lower-cased name, repeatedly, so
 * "episode.mp4.srt" becomes "episode"
 */
export function stripExtensions(name: string, extensions: string[]): string {
  let current = name;
  let stripped = true;

  while (stripped) {
    stripped = false;
    for (const ext of extensions) {
      if (current.length > ext.length && current.endsWith(ext)) {
        current = current.slice(0, -ext.length);
        stripped = true;
        break;
      }
    }
  }

  return current;
}

/**
 * Turns a filename into its loose and tight comparison keys
 * @param filename - A filename or a full path
 */
export function normalizeName(filename: string, options: NormalizeOptions = {}): NormalizedName {
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const noise = new Set(options.noiseTokens ?? DEFAULT_NOISE_TOKENS);

  const name = stripExtensions(baseName(filename).toLowerCase(), extensions);
  const tokens = name.split(SEPARATORS).filter(Boolean);

  const meaningful = tokens.filter((token) => !noise.has(token));
  // A name made only of noise keeps its tokens rather than vanishing
  const kept = meaningful.length > 0 ? meaningful : tokens;

  return {
    loose: kept.join(' '),
    tight: kept.join(''),
  };
}
