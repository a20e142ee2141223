import fs from 'fs';
import path from 'path';
import { baseName } from '../library/nameNormalizer';
import { Cue } from '../subtitles/types';
import {
  ClipRequest,
  EditorDependencies,
  EditorImport,
  EditorIntegration,
  EditorName,
  EditorReadiness,
} from './types';

/**
 * Walks up from a directory that may not exist yet to the closest one that
 * does. The import folder is only created when something is written to it.
 */
export async function nearestExistingDir(dir: string): Promise<string> {
  let current = path.resolve(dir);

  for (;;) {
    try {
      const stats = await fs.promises.stat(current);
      if (stats.isDirectory()) return current;
      throw new Error(`${current} is not a directory`);
    } catch (error) {
      const parent = path.dirname(current);
      if (parent === current || !isMissingPath(error)) throw error;
      current = parent;
    }
  }
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * File name without its last extension
 */
export function fileStem(filePath: string): string {
  const base = baseName(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Builds the clip for a cue, padded by handles on both sides
 */
export function clipFromCue(videoPath: string, cue: Cue, handleMs: number): ClipRequest {
  return {
    videoPath,
    startMs: Math.max(0, cue.startMs - handleMs),
    endMs: cue.endMs + handleMs,
    name: `${fileStem(videoPath)} #${cue.index}`,
  };
}

/**
 * Shared behaviour of editors that pick up files written to an import folder
 */
export abstract class FileDropEditor implements EditorIntegration {
  abstract readonly name: EditorName;
  abstract readonly label: string;
  protected abstract readonly fileExtension: string;

  constructor(protected readonly deps: EditorDependencies) {}

  /**
   * Renders the import document for a clip
   */
  protected abstract render(clip: ClipRequest, frameRate: number): string;

  async checkReadiness(): Promise<EditorReadiness> {
    const problems: string[] = [];

    if (!this.deps.probe.isAvailable()) {
      problems.push('ffprobe is not available; set FFMPEG_PATH');
    }

    try {
      await fs.promises.access(await nearestExistingDir(this.deps.importDir), fs.constants.W_OK);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`Import folder ${this.deps.importDir} is not writable: ${reason}`);
    }

    return { ready: problems.length === 0, problems };
  }

  detectFrameRate(videoPath: string): Promise<number> {
    return this.deps.probe.getFrameRate(videoPath);
  }

  async importMedia(videoPath: string): Promise<EditorImport> {
    const durationMs = await this.deps.probe.getDurationMs(videoPath);
    return this.importClip({ videoPath, startMs: 0, endMs: durationMs, name: fileStem(videoPath) });
  }

  async importClip(clip: ClipRequest): Promise<EditorImport> {
    if (clip.endMs <= clip.startMs) {
      throw new Error(`Clip "${clip.name}" has no duration`);
    }

    const frameRate = await this.detectFrameRate(clip.videoPath);
    const content = this.render(clip, frameRate);

    const safeName = clip.name.replace(/[^a-zA-Z0-9.-]/g, '_');
    const outputPath = path.join(this.deps.importDir, `${safeName}_${clip.startMs}.${this.fileExtension}`);

    await fs.promises.mkdir(this.deps.importDir, { recursive: true });
    await fs.promises.writeFile(outputPath, content, 'utf-8');
    console.info(`${this.label}: wrote ${path.basename(outputPath)} at ${frameRate.toFixed(3)} fps`);

    return { editor: this.name, outputPath, frameRate };
  }
}
