/**
 * A single timed entry parsed from a subtitle file
 */
export interface Cue {
  /** 1-based position among the accepted cues of the file */
  index: number;
  /** Start time in milliseconds since the start of the file */
  startMs: number;
  /** End time in milliseconds since the start of the file */
  endMs: number;
  /** Text with markup tags removed */
  text: string;
}

/**
 * Result of parsing a whole subtitle file
 */
export interface ParsedSubtitle {
  cues: Cue[];
  /** Blocks that could not be read as a cue and were left out */
  skippedBlocks: number;
}

/**
 * Parsed cues of one subtitle file together with the video it was matched to
 */
export interface IndexedSubtitle {
  subtitlePath: string;
  videoPath: string | null;
  cues: Cue[];
}

/**
 * A cue that matched a query
 */
export interface SearchHit {
  subtitlePath: string;
  /** Null when the subtitle has no matched video, so it cannot be played */
  videoPath: string | null;
  cue: Cue;
  /** Where the player should start, in milliseconds */
  seekMs: number;
}

export interface SubtitleFailure {
  subtitlePath: string;
  kind: 'parse' | 'read';
  message: string;
}

export interface SearchResult {
  keyword: string;
  hits: SearchHit[];
  failures: SubtitleFailure[];
  skippedBlocks: number;
}
