/**
 * A named group of subtitle and video files found under one show folder
 */
export interface Show {
  name: string;
  /** The registered media directory the show was found in */
  root: string;
  subtitlePaths: string[];
  videoPaths: string[];
}

/**
 * Comparable forms of a filename
 */
export interface NormalizedName {
  /** Tokens joined by a single space */
  loose: string;
  /** Tokens joined without separators, for containment checks */
  tight: string;
}

export type MatchStrategy = 'exact' | 'containment' | 'none';

/**
 * Association between a subtitle file and the video it plays against
 */
export interface FileMatch {
  subtitlePath: string;
  videoPath: string | null;
  strategy: MatchStrategy;
}

export interface MediaExtensions {
  subtitle: string[];
  video: string[];
}

/**
 * Summary of a show as listed to clients
 */
export interface ShowSummary {
  name: string;
  root: string;
  subtitleCount: number;
  videoCount: number;
  matchedCount: number;
}
