import { spawn } from 'child_process';
import fs from 'fs';
import { formatClockTime } from '../subtitles/cueParser';
import { LaunchCommand, MediaLauncher, PlayerLaunchError, PlayerType } from './types';

export type ExistsCheck = (filePath: string) => boolean;

/**
 * Returns the first candidate present on disk, else the fallback command,
 * which is left for the OS to resolve through PATH
 */
export function resolveExecutable(
  candidates: string[],
  fallback: string,
  exists: ExistsCheck = fs.existsSync
): string {
  return candidates.find((candidate) => exists(candidate)) ?? fallback;
}

function toSeconds(ms: number): string {
  return (Math.max(0, ms) / 1000).toString();
}

abstract class SpawnedLauncher implements MediaLauncher {
  abstract readonly type: PlayerType;

  abstract buildCommand(videoPath: string, startMs: number): LaunchCommand;

  launch(videoPath: string, startMs: number): Promise<LaunchCommand> {
    const launchCommand = this.buildCommand(videoPath, startMs);
    const { command, args } = launchCommand;

    console.info(`Executing command: ${command} ${args.map((arg) => JSON.stringify(arg)).join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });

      child.once('spawn', () => {
        child.unref();
        resolve(launchCommand);
      });

      child.once('error', (err) => {
        reject(new PlayerLaunchError(this.type, err.message));
      });
    });
  }
}

const MPC_HC_PATHS = [
  'C:\\Program Files\\MPC-HC\\mpc-hc64.exe',
  'C:\\Program Files (x86)\\MPC-HC\\mpc-hc.exe',
  'C:\\Program Files (x86)\\K-Lite Codec Pack\\MPC-HC64\\mpc-hc64.exe',
  'C:\\Program Files\\K-Lite Codec Pack\\MPC-HC64\\mpc-hc64.exe',
];

/**
 * Media Player Classic. Takes the start position as /start HH:MM:SS.
 */
export class MpcHcLauncher extends SpawnedLauncher {
  readonly type = 'mpc-hc';
  private executable: string;

  constructor(executablePath?: string, exists?: ExistsCheck) {
    super();
    this.executable = executablePath || resolveExecutable(MPC_HC_PATHS, 'mpc-hc64.exe', exists);
  }

  buildCommand(videoPath: string, startMs: number): LaunchCommand {
    return { command: this.executable, args: [videoPath, '/start', formatClockTime(startMs)] };
  }
}

const VLC_PATHS = [
  'C:\\Program Files\\VideoLAN\\VLC\\vlc.exe',
  'C:\\Program Files (x86)\\VideoLAN\\VLC\\vlc.exe',
  '/Applications/VLC.app/Contents/MacOS/VLC',
];

export class VlcLauncher extends SpawnedLauncher {
  readonly type = 'vlc';
  private executable: string;

  constructor(executablePath?: string, exists?: ExistsCheck) {
    super();
    this.executable = executablePath || resolveExecutable(VLC_PATHS, 'vlc', exists);
  }

  buildCommand(videoPath: string, startMs: number): LaunchCommand {
    return { command: this.executable, args: [`--start-time=${toSeconds(startMs)}`, videoPath] };
  }
}

export class MpvLauncher extends SpawnedLauncher {
  readonly type = 'mpv';
  private executable: string;

  constructor(executablePath?: string) {
    super();
    this.executable = executablePath || 'mpv';
  }

  buildCommand(videoPath: string, startMs: number): LaunchCommand {
    return { command: this.executable, args: [`--start=${toSeconds(startMs)}`, videoPath] };
  }
}

/**
 * Hands the file to whatever the OS opens videos with. Cannot seek.
 */
export class SystemLauncher extends SpawnedLauncher {
  readonly type = 'system';

  constructor(private readonly platform: NodeJS.Platform = process.platform) {
    super();
  }

  buildCommand(videoPath: string): LaunchCommand {
    switch (this.platform) {
      case 'win32':
        // Not through cmd.exe, which would interpret & and ^ in the path
        return { command: 'explorer.exe', args: [videoPath] };
      case 'darwin':
        return { command: 'open', args: [videoPath] };
      default:
        return { command: 'xdg-open', args: [videoPath] };
    }
  }
}
