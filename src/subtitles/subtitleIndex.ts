import { Cue, IndexedSubtitle, SearchHit } from './types';

interface IndexedCue {
  cue: Cue;
  haystack: string;
}

interface IndexedFile {
  subtitlePath: string;
  videoPath: string | null;
  cues: IndexedCue[];
}

/**
 * In-memory keyword index over the cues of one show
 */
export class SubtitleIndex {
  private entries: IndexedFile[] = [];

  /**
   * Replaces the indexed content
   * @param subtitles - Parsed files in discovery order; hits keep this order
   */
  build(subtitles: Iterable<IndexedSubtitle>): void {
    const entries: IndexedFile[] = [];

    for (const subtitle of subtitles) {
      const cues = [...subtitle.cues]
        .sort((a, b) => a.index - b.index)
        .map((cue) => ({ cue, haystack: cue.text.toLowerCase() }));

      entries.push({ subtitlePath: subtitle.subtitlePath, videoPath: subtitle.videoPath, cues });
    }

    this.entries = entries;
  }

  /**
   * Case-insensitive substring search over cue text.
   * An empty keyword yields no hits.
   */
  query(keyword: string): SearchHit[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];

    const hits: SearchHit[] = [];
    for (const entry of this.entries) {
      for (const { cue, haystack } of entry.cues) {
        if (!haystack.includes(needle)) continue;

        hits.push({
          subtitlePath: entry.subtitlePath,
          videoPath: entry.videoPath,
          cue,
          seekMs: cue.startMs,
        });
      }
    }

    return hits;
  }

  /**
   * Looks up a cue by its file and ordinal
   */
  findCue(subtitlePath: string, cueIndex: number): { cue: Cue; videoPath: string | null } | null {
    const entry = this.entries.find((file) => file.subtitlePath === subtitlePath);
    const found = entry?.cues.find(({ cue }) => cue.index === cueIndex);
    if (!entry || !found) return null;
    return { cue: found.cue, videoPath: entry.videoPath };
  }

  get files(): string[] {
    return this.entries.map((entry) => entry.subtitlePath);
  }

  /** Total number of indexed cues */
  get size(): number {
    return this.entries.reduce((sum, entry) => sum + entry.cues.length, 0);
  }
}
