import { Show, FileMatch } from '../library/types';
import { Cue, IndexedSubtitle, SearchResult, SubtitleFailure } from './types';
import { SubtitleIndex } from './subtitleIndex';
import { parseSubtitleFile, readSubtitleFromDisk, SubtitleReader } from './cueParser';
import { ParseError, SubtitleReadError } from './errors';

/**
 * Owns the parsed cues of the show currently being searched.
 *
 * Nothing is parsed until the first search; the cache lives exactly as long as
 * the session and is dropped by invalidate() or by replacing the session.
 */
export class ShowSession {
  private index: SubtitleIndex | null = null;
  private failures: SubtitleFailure[] = [];
  private skippedBlocks = 0;

  constructor(
    readonly show: Show,
    private readonly matches: Map<string, FileMatch>,
    private readonly reader: SubtitleReader = readSubtitleFromDisk
  ) {}

  get isIndexed(): boolean {
    return this.index !== null;
  }

  /**
   * Searches the show's cues, parsing its subtitle files on first use
   */
  search(keyword: string): SearchResult {
    const trimmed = keyword.trim();
    if (!trimmed) {
      return { keyword: trimmed, hits: [], failures: [], skippedBlocks: 0 };
    }

    const index = this.ensureIndex();

    return {
      keyword: trimmed,
      hits: index.query(trimmed),
      failures: [...this.failures],
      skippedBlocks: this.skippedBlocks,
    };
  }

  /**
   * Finds a cue and the video it plays against
   */
  findCue(subtitlePath: string, cueIndex: number): { cue: Cue; videoPath: string | null } | null {
    return this.ensureIndex().findCue(subtitlePath, cueIndex);
  }

  /**
   * Drops parsed cues so the next search parses again
   */
  invalidate(): void {
    this.index = null;
    this.failures = [];
    this.skippedBlocks = 0;
  }

  private ensureIndex(): SubtitleIndex {
    if (this.index) return this.index;

    const parsed: IndexedSubtitle[] = [];
    const failures: SubtitleFailure[] = [];
    let skippedBlocks = 0;

    for (const subtitlePath of this.show.subtitlePaths) {
      try {
        const result = parseSubtitleFile(subtitlePath, this.reader);
        skippedBlocks += result.skippedBlocks;
        parsed.push({
          subtitlePath,
          videoPath: this.matches.get(subtitlePath)?.videoPath ?? null,
          cues: result.cues,
        });
      } catch (error) {
        if (error instanceof ParseError) {
          skippedBlocks += error.skippedBlocks;
          failures.push({ subtitlePath, kind: 'parse', message: error.message });
        } else if (error instanceof SubtitleReadError) {
          failures.push({ subtitlePath, kind: 'read', message: error.message });
        } else {
          throw error;
        }
        console.warn(`Skipping subtitle file: ${error.message}`);
      }
    }

    const index = new SubtitleIndex();
    index.build(parsed);

    console.info(
      `Indexed ${index.size} cues from ${parsed.length}/${this.show.subtitlePaths.length} subtitle files of "${this.show.name}"`
    );

    this.index = index;
    this.failures = failures;
    this.skippedBlocks = skippedBlocks;
    return index;
  }
}
