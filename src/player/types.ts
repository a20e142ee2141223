export type PlayerType = 'mpc-hc' | 'vlc' | 'mpv' | 'system';

export const PLAYER_TYPES: PlayerType[] = ['mpc-hc', 'vlc', 'mpv', 'system'];

/**
 * A process invocation that opens a video
 */
export interface LaunchCommand {
  command: string;
  args: string[];
}

/**
 * Opens a video in an external player at a given position
 */
export interface MediaLauncher {
  readonly type: PlayerType;

  /**
   * Builds the command line without running it
   * @param startMs - Position to start playback at; ignored by players that cannot seek
   */
  buildCommand(videoPath: string, startMs: number): LaunchCommand;

  /**
   * Starts the player detached from this process
   * @returns The command that was run
   */
  launch(videoPath: string, startMs: number): Promise<LaunchCommand>;
}

export class PlayerLaunchError extends Error {
  constructor(
    public readonly player: PlayerType,
    message: string
  ) {
    super(`Error launching ${player}: ${message}`);
    this.name = 'PlayerLaunchError';
  }
}
