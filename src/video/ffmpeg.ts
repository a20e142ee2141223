import { spawn, execFileSync } from 'child_process';
import { config } from '../config';

/**
 * Parses ffprobe's rational frame rate ("24000/1001", "25/1" or "29.97")
 * @returns Frames per second, or null when the value is not usable
 */
export function parseFrameRate(value: string): number | null {
  const trimmed = value.trim();
  const [numerator, denominator] = trimmed.split('/');
  const num = parseFloat(numerator ?? '');
  const den = denominator === undefined ? 1 : parseFloat(denominator);

  if (isNaN(num) || isNaN(den) || num <= 0 || den <= 0) {
    return null;
  }

  // Timecode needs at least one frame per second
  const rate = num / den;
  return rate >= 1 ? rate : null;
}

/**
 * ffprobe wrapper for inspecting media files
 */
export class FFmpegProcessor {
  private ffmpegPath: string;

  constructor(ffmpegPath?: string) {
    this.ffmpegPath = ffmpegPath ?? (config.ffmpegPath || 'ffmpeg');
  }

  private get ffprobePath(): string {
    return this.ffmpegPath.replace(/ffmpeg(?=(\.exe)?$)/, 'ffprobe');
  }

  /**
   * Checks if ffprobe is available in the system
   */
  isAvailable(): boolean {
    return this.getVersion() !== null;
  }

  /**
   * Gets the ffprobe version string
   * @returns Version string or null if not available
   */
  getVersion(): string | null {
    try {
      const output = execFileSync(this.ffprobePath, ['-version'], { encoding: 'utf-8', stdio: 'pipe' });
      const match = output.match(/ffprobe version ([^\s]+)/);
      return match?.[1] ?? null;
    } catch {
      return null;
    }
  }

  /**
   * Gets media duration in milliseconds
   */
  async getDurationMs(videoPath: string): Promise<number> {
    const output = await this.runCommand(this.ffprobePath, [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ]);
    const duration = parseFloat(output.trim());

    if (isNaN(duration)) {
      throw new Error(`Could not determine duration for ${videoPath}`);
    }

    return Math.round(duration * 1000);
  }

  /**
   * Gets the frame rate of the first video stream
   */
  async getFrameRate(videoPath: string): Promise<number> {
    const output = await this.runCommand(this.ffprobePath, [
      '-v',
      'error',
      '-select_streams',
      'v:0',
      '-show_entries',
      'stream=r_frame_rate',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ]);
    const rate = parseFrameRate(output.split('\n')[0] ?? '');

    if (rate === null) {
      throw new Error(`Could not determine frame rate for ${videoPath}`);
    }

    return rate;
  }

  /**
   * Runs a command with the given arguments
   * @returns Promise that resolves with stdout when command completes
   */
  private runCommand(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new Error(`Command failed with code ${code}: ${stderr}`));
        }
      });

      child.on('error', (err) => {
        reject(new Error(`Failed to start command: ${err.message}`));
      });
    });
  }
}
