import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { renderEdl } from './resolve';
import { renderXmeml } from './premiere';
import { clipFromCue, fileStem, nearestExistingDir } from './fileDropEditor';
import { checkAllEditors, getEditorIntegration } from './registry';
import { ClipRequest, EditorDependencies, MediaProbe, UnknownEditorError } from './types';

const clip: ClipRequest = {
  videoPath: '/media/Show/Show 1x01.mp4',
  startMs: 1000,
  endMs: 4500,
  name: 'Show 1x01 #3',
};

function fakeProbe(overrides: Partial<MediaProbe> = {}): MediaProbe {
  return {
    isAvailable: () => true,
    getFrameRate: async () => 25,
    getDurationMs: async () => 60000,
    ...overrides,
  };
}

describe('fileStem', () => {
  it('should drop only the last extension', () => {
    expect(fileStem('/media/Show/Show 1x01.mp4')).toBe('Show 1x01');
    expect(fileStem('C:\\Shows\\ep.final.mkv')).toBe('ep.final');
    expect(fileStem('/media/noext')).toBe('noext');
  });
});

describe('clipFromCue', () => {
  it('should pad the cue with handles and clamp at zero', () => {
    const cue = { index: 3, startMs: 500, endMs: 2500, text: 'Hi' };
    expect(clipFromCue('/media/Show/Show 1x01.mp4', cue, 1000)).toEqual({
      videoPath: '/media/Show/Show 1x01.mp4',
      startMs: 0,
      endMs: 3500,
      name: 'Show 1x01 #3',
    });
  });
});

describe('renderEdl', () => {
  it('should write a single CMX 3600 event', () => {
    expect(renderEdl(clip, 25)).toBe(
      [
        'TITLE: Show 1x01 #3',
        'FCM: NON-DROP FRAME',
        '',
        '001  AX       AA/V  C        00:00:01:00 00:00:04:13 01:00:00:00 01:00:03:13',
        '* FROM CLIP NAME: Show 1x01',
        '* SOURCE FILE: /media/Show/Show 1x01.mp4',
        '',
      ].join('\n')
    );
  });
});

describe('renderXmeml', () => {
  it('should write in and out points in frames at an NTSC rate', () => {
    const lines = renderXmeml({ ...clip, endMs: 3000, name: 'Tom & Jerry' }, 24000 / 1001).split('\n');
    const trimmed = lines.map((line) => line.trim());

    expect(lines[0]).toBe('<?xml version="1.0" encoding="UTF-8"?>');
    expect(trimmed).toContain('<name>Tom &amp; Jerry</name>');
    expect(trimmed).toContain('<duration>48</duration>');
    expect(trimmed).toContain('<rate><timebase>24</timebase><ntsc>TRUE</ntsc></rate>');
    expect(trimmed).toContain('<in>24</in>');
    expect(trimmed).toContain('<out>72</out>');
    expect(trimmed).toContain('<pathurl>file:///media/Show/Show%201x01.mp4</pathurl>');
  });

  it('should mark whole frame rates as non-NTSC', () => {
    const trimmed = renderXmeml(clip, 25)
      .split('\n')
      .map((line) => line.trim());
    expect(trimmed).toContain('<rate><timebase>25</timebase><ntsc>FALSE</ntsc></rate>');
  });
});

describe('editor integrations', () => {
  let importDir: string;
  let deps: EditorDependencies;

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    importDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'moment-editors-')), 'imports');
    deps = { importDir, probe: fakeProbe() };
  });

  afterEach(() => {
    fs.rmSync(path.dirname(importDir), { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should write an EDL for a clip', async () => {
    const resolve = getEditorIntegration('resolve', deps);
    const result = await resolve.importClip(clip);

    expect(result).toEqual({
      editor: 'resolve',
      outputPath: path.join(importDir, 'Show_1x01__3_1000.edl'),
      frameRate: 25,
    });
    expect(fs.readFileSync(result.outputPath, 'utf-8')).toBe(renderEdl(clip, 25));
  });

  it('should import a whole video using its duration', async () => {
    const premiere = getEditorIntegration('premiere', deps);
    const result = await premiere.importMedia('/media/Show/Show 1x01.mp4');

    expect(result.outputPath).toBe(path.join(importDir, 'Show_1x01_0.xml'));
    const trimmed = fs
      .readFileSync(result.outputPath, 'utf-8')
      .split('\n')
      .map((line) => line.trim());
    expect(trimmed).toContain('<out>1500</out>');
  });

  it('should detect the frame rate through the probe', async () => {
    const getFrameRate = vi.fn(async () => 29.97);
    const resolve = getEditorIntegration('resolve', { importDir, probe: fakeProbe({ getFrameRate }) });

    await expect(resolve.detectFrameRate('/media/a.mp4')).resolves.toBe(29.97);
    expect(getFrameRate).toHaveBeenCalledWith('/media/a.mp4');
  });

  it('should reject clips without duration', async () => {
    const resolve = getEditorIntegration('resolve', deps);
    await expect(resolve.importClip({ ...clip, endMs: clip.startMs })).rejects.toThrow(
      'Clip "Show 1x01 #3" has no duration'
    );
  });

  it('should report readiness problems', async () => {
    const editor = getEditorIntegration('premiere', { importDir, probe: fakeProbe({ isAvailable: () => false }) });

    await expect(editor.checkReadiness()).resolves.toEqual({
      ready: false,
      problems: ['ffprobe is not available; set FFMPEG_PATH'],
    });
  });

  it('should check readiness without creating the import folder', async () => {
    const editor = getEditorIntegration('resolve', deps);

    await expect(editor.checkReadiness()).resolves.toEqual({ ready: true, problems: [] });
    expect(fs.existsSync(importDir)).toBe(false);
  });

  it('should resolve a missing import folder to its closest existing parent', async () => {
    await expect(nearestExistingDir(path.join(importDir, 'nested', 'deeper'))).resolves.toBe(
      path.dirname(importDir)
    );
  });

  it('should report an import folder that sits under a file', async () => {
    const blocker = path.join(path.dirname(importDir), 'blocker');
    fs.writeFileSync(blocker, '');
    const editor = getEditorIntegration('resolve', { importDir: path.join(blocker, 'imports'), probe: fakeProbe() });

    const readiness = await editor.checkReadiness();
    expect(readiness.ready).toBe(false);
    expect(readiness.problems).toEqual([
      `Import folder ${path.join(blocker, 'imports')} is not writable: ${blocker} is not a directory`,
    ]);
  });

  it('should check every editor', async () => {
    const results = await checkAllEditors(deps);
    expect([...results.entries()]).toEqual([
      ['resolve', true],
      ['premiere', true],
    ]);
  });

  it('should reject unknown editors', () => {
    expect(() => getEditorIntegration('avid', deps)).toThrow(UnknownEditorError);
    expect(() => getEditorIntegration('avid', deps)).toThrow('Unknown editor: avid');
  });
});
