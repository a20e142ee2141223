/**
 * Converts milliseconds to a whole frame count at the given rate
 */
export function msToFrames(ms: number, frameRate: number): number {
  return Math.round((Math.max(0, ms) * frameRate) / 1000);
}

/**
 * Formats a frame count as non-drop-frame HH:MM:SS:FF
 */
export function framesToTimecode(frames: number, frameRate: number): string {
  const timebase = Math.max(1, Math.round(frameRate));
  const framesPart = frames % timebase;
  const totalSeconds = Math.floor(frames / timebase);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return [hours, minutes, seconds, framesPart].map((part) => part.toString().padStart(2, '0')).join(':');
}
