import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { walkFiles, groupByTopLevelFolder, classifyFile, buildShows, scanLibrary } from './scanner';

const extensions = { subtitle: ['.srt', '.txt'], video: ['.mp4', '.mkv'] };

describe('classifyFile', () => {
  it('should classify by extension, case-insensitively', () => {
    expect(classifyFile('/a/Ep1.SRT', extensions)).toBe('subtitle');
    expect(classifyFile('/a/Ep1.mkv', extensions)).toBe('video');
    expect(classifyFile('/a/cover.jpg', extensions)).toBeNull();
  });

  it('should read a video-named subtitle as a subtitle', () => {
    expect(classifyFile('/a/Ep1.mp4.srt', extensions)).toBe('subtitle');
  });
});

describe('groupByTopLevelFolder', () => {
  it('should group by the first folder below the root and ignore loose files', () => {
    const root = path.join('/media', 'tv');
    const files = [
      path.join(root, 'readme.txt'),
      path.join(root, 'Show A', 'Subtitles', 'a1.srt'),
      path.join(root, 'Show A', 'Season 1', 'a1.mp4'),
      path.join(root, 'Show B', 'b1.srt'),
    ];

    expect(groupByTopLevelFolder(root, files)).toEqual([
      { name: 'Show A', root, files: [files[1], files[2]] },
      { name: 'Show B', root, files: [files[3]] },
    ]);
  });
});

describe('buildShows', () => {
  it('should split files into subtitles and videos and drop groups without subtitles', () => {
    const shows = buildShows(
      [
        { name: 'Show A', root: '/r', files: ['/r/Show A/b.srt', '/r/Show A/a.mp4', '/r/Show A/a.srt', '/r/Show A/x.nfo'] },
        { name: 'Movies', root: '/r', files: ['/r/Movies/m.mkv'] },
      ],
      extensions
    );

    expect(shows).toEqual([
      {
        name: 'Show A',
        root: '/r',
        subtitlePaths: ['/r/Show A/a.srt', '/r/Show A/b.srt'],
        videoPaths: ['/r/Show A/a.mp4'],
      },
    ]);
  });
});

describe('scanning a directory tree', () => {
  let first: string;
  let second: string;

  const touch = (root: string, ...segments: string[]): void => {
    const file = path.join(root, ...segments);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '');
  };

  beforeAll(() => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'moment-navigator-'));
    first = path.join(base, 'tv');
    second = path.join(base, 'anime');

    touch(first, 'Show', 'Subtitles', 'Show 1x01.srt');
    touch(first, 'Show', 'Season 1', 'Show 1x01.mp4');
    touch(first, 'Show', '.hidden', 'skip.srt');
    touch(first, 'Docs', 'notes.md');
    touch(second, 'Show', 'ep1.srt');
  });

  afterAll(() => {
    fs.rmSync(path.dirname(first), { recursive: true, force: true });
  });

  it('should list files recursively in sorted order without hidden entries', () => {
    expect(walkFiles(first)).toEqual([
      path.join(first, 'Docs', 'notes.md'),
      path.join(first, 'Show', 'Season 1', 'Show 1x01.mp4'),
      path.join(first, 'Show', 'Subtitles', 'Show 1x01.srt'),
    ]);
  });

  it('should return nothing for a missing directory', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(walkFiles(path.join(first, 'missing'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('should find shows across roots and tell same-named shows apart', () => {
    const shows = scanLibrary([first, second], extensions);

    expect(shows.map((show) => show.name)).toEqual(['Show', 'Show [anime]']);
    expect(shows[0]?.subtitlePaths).toEqual([path.join(first, 'Show', 'Subtitles', 'Show 1x01.srt')]);
    expect(shows[0]?.videoPaths).toEqual([path.join(first, 'Show', 'Season 1', 'Show 1x01.mp4')]);
    expect(shows[1]?.subtitlePaths).toEqual([path.join(second, 'Show', 'ep1.srt')]);
    expect(shows[1]?.videoPaths).toEqual([]);
  });
});

describe('scanning a tree with symlinks', () => {
  let base: string;
  let lib: string;

  beforeAll(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'moment-links-'));
    const store = path.join(base, 'store');
    lib = path.join(base, 'lib');

    fs.mkdirSync(path.join(store, 'Real'), { recursive: true });
    fs.mkdirSync(path.join(lib, 'Show'), { recursive: true });
    fs.writeFileSync(path.join(store, 'ep1.mp4'), '');
    fs.writeFileSync(path.join(store, 'Real', 'r1.srt'), '');
    fs.writeFileSync(path.join(lib, 'Show', 'ep1.srt'), '');

    fs.symlinkSync(path.join(store, 'ep1.mp4'), path.join(lib, 'Show', 'ep1.mp4'));
    fs.symlinkSync(path.join(store, 'missing.mp4'), path.join(lib, 'Show', 'broken.mp4'));
    fs.symlinkSync(path.join(lib, 'Show'), path.join(lib, 'Show', 'loop'), 'dir');
    fs.symlinkSync(path.join(store, 'Real'), path.join(lib, 'Linked'), 'dir');
  });

  afterAll(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  it('should follow linked files and folders, skip broken links and not loop', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(walkFiles(lib)).toEqual([
      path.join(lib, 'Linked', 'r1.srt'),
      path.join(lib, 'Show', 'ep1.mp4'),
      path.join(lib, 'Show', 'ep1.srt'),
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('should surface a linked show folder and a linked video', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(scanLibrary([lib], extensions)).toEqual([
      { name: 'Linked', root: lib, subtitlePaths: [path.join(lib, 'Linked', 'r1.srt')], videoPaths: [] },
      {
        name: 'Show',
        root: lib,
        subtitlePaths: [path.join(lib, 'Show', 'ep1.srt')],
        videoPaths: [path.join(lib, 'Show', 'ep1.mp4')],
      },
    ]);
    warn.mockRestore();
  });
});

describe('naming shows repeated across roots', () => {
  let base: string;

  beforeAll(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'moment-roots-'));
    for (const parent of ['a', 'b', 'c']) {
      fs.mkdirSync(path.join(base, parent, 'tv', 'Show'), { recursive: true });
      fs.writeFileSync(path.join(base, parent, 'tv', 'Show', 'ep1.srt'), '');
    }
  });

  afterAll(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  it('should keep every name distinct when the root folders share a name', () => {
    const roots = ['a', 'b', 'c'].map((parent) => path.join(base, parent, 'tv'));
    const shows = scanLibrary(roots, extensions);

    expect(shows.map((show) => [show.name, show.root])).toEqual([
      ['Show', roots[0]],
      ['Show [tv]', roots[1]],
      ['Show [tv] (2)', roots[2]],
    ]);
  });
});
