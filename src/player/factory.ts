import { LaunchCommand, MediaLauncher, PLAYER_TYPES, PlayerLaunchError, PlayerType } from './types';
import { MpcHcLauncher, MpvLauncher, SystemLauncher, VlcLauncher } from './launchers';

const LAUNCHERS: Record<PlayerType, (executablePath?: string) => MediaLauncher> = {
  'mpc-hc': (executablePath) => new MpcHcLauncher(executablePath),
  vlc: (executablePath) => new VlcLauncher(executablePath),
  mpv: (executablePath) => new MpvLauncher(executablePath),
  system: () => new SystemLauncher(),
};

export function isPlayerType(value: string): value is PlayerType {
  return (PLAYER_TYPES as string[]).includes(value);
}

/**
 * Factory function to create media launchers
 */
export function createMediaLauncher(type: string, executablePath?: string): MediaLauncher {
  if (!isPlayerType(type)) {
    throw new Error(`Unknown player type: ${type}`);
  }
  return LAUNCHERS[type](executablePath);
}

export interface LaunchOutcome {
  player: PlayerType;
  command: LaunchCommand;
  /** True when the configured player failed and the system opener was used */
  usedFallback: boolean;
}

/**
 * Launches the player, falling back to the system opener (without seeking)
 * when the player cannot be started
 */
export async function launchWithFallback(
  launcher: MediaLauncher,
  videoPath: string,
  startMs: number,
  fallback: MediaLauncher = new SystemLauncher()
): Promise<LaunchOutcome> {
  try {
    const command = await launcher.launch(videoPath, startMs);
    return { player: launcher.type, command, usedFallback: false };
  } catch (error) {
    if (!(error instanceof PlayerLaunchError) || launcher.type === fallback.type) {
      throw error;
    }

    console.warn(`${error.message}; opening with the default player instead`);
    const command = await fallback.launch(videoPath, startMs);
    return { player: fallback.type, command, usedFallback: true };
  }
}
