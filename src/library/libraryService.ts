import { FileMatch, MediaExtensions, Show, ShowSummary } from './types';
import { matchFiles } from './fileMatcher';
import { scanLibrary } from './scanner';
import { NoVideoMatchError, NotFoundError } from './errors';
import { ShowSession } from '../subtitles/showSession';
import { readSubtitleFromDisk, SubtitleReader } from '../subtitles/cueParser';
import { Cue, SearchResult } from '../subtitles/types';
import { config } from '../config';

export interface LibraryOptions {
  roots: string[];
  extensions: MediaExtensions;
  noiseTokens: string[];
  reader: SubtitleReader;
  scan: (roots: string[], extensions: MediaExtensions) => Show[];
}

/**
 * Where a player should open for a chosen cue
 */
export interface PlaybackTarget {
  subtitlePath: string;
  videoPath: string;
  startMs: number;
  cue: Cue;
}

/**
 * Holds the scanned shows, their subtitle-to-video matches and the session of
 * the show being searched
 */
export class LibraryService {
  private options: LibraryOptions;
  private shows = new Map<string, Show>();
  private matches = new Map<string, Map<string, FileMatch>>();
  private session: ShowSession | null = null;

  constructor(options: Partial<LibraryOptions> = {}) {
    this.options = {
      roots: options.roots ?? config.mediaDirectories,
      extensions: options.extensions ?? {
        subtitle: config.subtitleExtensions,
        video: config.videoExtensions,
      },
      noiseTokens: options.noiseTokens ?? config.nameNoiseTokens,
      reader: options.reader ?? readSubtitleFromDisk,
      scan: options.scan ?? scanLibrary,
    };
  }

  get roots(): string[] {
    return [...this.options.roots];
  }

  /** Name of the show whose cues are currently cached, if any */
  get activeShow(): string | null {
    return this.session?.show.name ?? null;
  }

  /**
   * Replaces the registered media directories and rescans
   */
  setRoots(roots: string[]): ShowSummary[] {
    this.options.roots = [...roots];
    return this.reload();
  }

  /**
   * Rescans the media directories and recomputes every show's matches.
   * Cached cues are discarded.
   */
  reload(): ShowSummary[] {
    const { roots, extensions, noiseTokens } = this.options;
    const normalizeOptions = {
      extensions: [...extensions.subtitle, ...extensions.video],
      noiseTokens,
    };

    this.shows.clear();
    this.matches.clear();
    this.session = null;

    for (const show of this.options.scan(roots, extensions)) {
      this.shows.set(show.name, show);
      this.matches.set(show.name, matchFiles(show.subtitlePaths, show.videoPaths, normalizeOptions));
    }

    const summaries = this.listShows();
    const matched = summaries.reduce((sum, show) => sum + show.matchedCount, 0);
    const subtitles = summaries.reduce((sum, show) => sum + show.subtitleCount, 0);
    console.info(
      `Loaded ${summaries.length} shows from ${roots.length} media directories; mapped ${matched}/${subtitles} subtitle files to videos`
    );

    return summaries;
  }

  listShows(): ShowSummary[] {
    return [...this.shows.values()].map((show) => ({
      name: show.name,
      root: show.root,
      subtitleCount: show.subtitlePaths.length,
      videoCount: show.videoPaths.length,
      matchedCount: [...(this.matches.get(show.name)?.values() ?? [])].filter(
        (match) => match.videoPath !== null
      ).length,
    }));
  }

  getShow(name: string): Show {
    const show = this.shows.get(name);
    if (!show) {
      throw new NotFoundError(`Show "${name}" not found`);
    }
    return show;
  }

  getMatches(name: string): FileMatch[] {
    this.getShow(name);
    return [...(this.matches.get(name)?.values() ?? [])];
  }

  /**
   * Makes a show the active one. Switching shows drops the previous show's
   * cues; the new show is parsed on its first search.
   */
  selectShow(name: string): ShowSession {
    if (this.session?.show.name === name) {
      return this.session;
    }

    const show = this.getShow(name);
    this.session = new ShowSession(
      show,
      this.matches.get(name) ?? new Map<string, FileMatch>(),
      this.options.reader
    );
    return this.session;
  }

  /**
   * Whether a path is one of the scanned video files
   */
  isKnownVideo(videoPath: string): boolean {
    return [...this.shows.values()].some((show) => show.videoPaths.includes(videoPath));
  }

  search(name: string, keyword: string): SearchResult {
    return this.selectShow(name).search(keyword);
  }

  /**
   * Finds the video and start time for a cue
   * @throws NotFoundError when the subtitle or cue is unknown
   * @throws NoVideoMatchError when the subtitle has no matched video
   */
  resolvePlayback(subtitlePath: string, cueIndex: number): PlaybackTarget {
    const show = [...this.shows.values()].find((candidate) =>
      candidate.subtitlePaths.includes(subtitlePath)
    );
    if (!show) {
      throw new NotFoundError(`Subtitle file ${subtitlePath} is not part of the library`);
    }

    const found = this.selectShow(show.name).findCue(subtitlePath, cueIndex);
    if (!found) {
      throw new NotFoundError(`Cue ${cueIndex} not found in ${subtitlePath}`);
    }
    if (!found.videoPath) {
      throw new NoVideoMatchError(subtitlePath);
    }

    return {
      subtitlePath,
      videoPath: found.videoPath,
      startMs: found.cue.startMs,
      cue: found.cue,
    };
  }
}

// Singleton instance
export const library = new LibraryService();
