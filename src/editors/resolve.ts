import { FileDropEditor, fileStem } from './fileDropEditor';
import { ClipRequest } from './types';
import { framesToTimecode, msToFrames } from './timecode';

/** Record timeline starts at one hour, as edit decision lists usually do */
const RECORD_START_HOURS = 1;

/**
 * Renders a single-event CMX 3600 edit decision list
 */
export function renderEdl(clip: ClipRequest, frameRate: number): string {
  const sourceIn = msToFrames(clip.startMs, frameRate);
  const sourceOut = msToFrames(clip.endMs, frameRate);
  const recordIn = RECORD_START_HOURS * 3600 * Math.round(frameRate);
  const recordOut = recordIn + (sourceOut - sourceIn);

  const event = [
    '001 ',
    'AX'.padEnd(8),
    'AA/V'.padEnd(5),
    'C'.padEnd(8),
    framesToTimecode(sourceIn, frameRate),
    framesToTimecode(sourceOut, frameRate),
    framesToTimecode(recordIn, frameRate),
    framesToTimecode(recordOut, frameRate),
  ].join(' ');

  return [
    `TITLE: ${clip.name}`,
    'FCM: NON-DROP FRAME',
    '',
    event,
    `* FROM CLIP NAME: ${fileStem(clip.videoPath)}`,
    `* SOURCE FILE: ${clip.videoPath}`,
    '',
  ].join('\n');
}

/**
 * DaVinci Resolve: imports timelines from EDL files
 */
export class ResolveIntegration extends FileDropEditor {
  readonly name = 'resolve';
  readonly label = 'DaVinci Resolve';
  protected readonly fileExtension = 'edl';

  protected render(clip: ClipRequest, frameRate: number): string {
    return renderEdl(clip, frameRate);
  }
}
