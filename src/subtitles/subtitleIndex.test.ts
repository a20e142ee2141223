import { describe, it, expect } from 'vitest';
import { SubtitleIndex } from './subtitleIndex';
import { Cue } from './types';

function cue(index: number, startMs: number, text: string): Cue {
  return { index, startMs, endMs: startMs + 2000, text };
}

describe('SubtitleIndex', () => {
  it('should find a cue case-insensitively and seek to its start', () => {
    const index = new SubtitleIndex();
    index.build([
      {
        subtitlePath: 'ep1.srt',
        videoPath: 'ep1.mp4',
        cues: [cue(1, 1000, 'Hello there'), cue(2, 5000, 'Goodbye')],
      },
    ]);

    expect(index.query('hello')).toEqual([
      {
        subtitlePath: 'ep1.srt',
        videoPath: 'ep1.mp4',
        cue: { index: 1, startMs: 1000, endMs: 3000, text: 'Hello there' },
        seekMs: 1000,
      },
    ]);
  });

  it('should return nothing for an empty or blank keyword', () => {
    const index = new SubtitleIndex();
    index.build([{ subtitlePath: 'ep1.srt', videoPath: null, cues: [cue(1, 0, 'Anything')] }]);

    expect(index.query('')).toEqual([]);
    expect(index.query('   ')).toEqual([]);
  });

  it('should order hits by file discovery order, then by cue index', () => {
    const index = new SubtitleIndex();
    index.build([
      { subtitlePath: 'b.srt', videoPath: 'b.mp4', cues: [cue(2, 9000, 'door two'), cue(1, 100, 'door one')] },
      { subtitlePath: 'a.srt', videoPath: 'a.mp4', cues: [cue(1, 500, 'the DOOR')] },
    ]);

    const hits = index.query('door');
    expect(hits.map((hit) => [hit.subtitlePath, hit.cue.index])).toEqual([
      ['b.srt', 1],
      ['b.srt', 2],
      ['a.srt', 1],
    ]);
  });

  it('should keep hits from subtitles without a video', () => {
    const index = new SubtitleIndex();
    index.build([{ subtitlePath: 'extras.srt', videoPath: null, cues: [cue(1, 42000, 'Hello again')] }]);

    const hits = index.query('hello');
    expect(hits).toHaveLength(1);
    expect(hits[0]?.videoPath).toBeNull();
    expect(hits[0]?.seekMs).toBe(42000);
  });

  it('should replace previous content on rebuild', () => {
    const index = new SubtitleIndex();
    index.build([{ subtitlePath: 'old.srt', videoPath: null, cues: [cue(1, 0, 'hello')] }]);
    index.build([{ subtitlePath: 'new.srt', videoPath: null, cues: [cue(1, 0, 'bye')] }]);

    expect(index.query('hello')).toEqual([]);
    expect(index.files).toEqual(['new.srt']);
    expect(index.size).toBe(1);
  });

  it('should look up cues by file and index', () => {
    const index = new SubtitleIndex();
    index.build([{ subtitlePath: 'ep1.srt', videoPath: 'ep1.mp4', cues: [cue(1, 0, 'a'), cue(2, 3000, 'b')] }]);

    expect(index.findCue('ep1.srt', 2)).toEqual({ cue: cue(2, 3000, 'b'), videoPath: 'ep1.mp4' });
    expect(index.findCue('ep1.srt', 3)).toBeNull();
    expect(index.findCue('ep2.srt', 1)).toBeNull();
  });
});
