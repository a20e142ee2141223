import { pathToFileURL } from 'url';
import { FileDropEditor, fileStem } from './fileDropEditor';
import { ClipRequest } from './types';
import { msToFrames } from './timecode';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Renders a one-clip sequence in Final Cut Pro 7 XML, which Premiere imports
 */
export function renderXmeml(clip: ClipRequest, frameRate: number): string {
  const timebase = Math.round(frameRate);
  const ntsc = Math.abs(frameRate - timebase) > 0.001 ? 'TRUE' : 'FALSE';
  const inFrame = msToFrames(clip.startMs, frameRate);
  const outFrame = msToFrames(clip.endMs, frameRate);
  const duration = outFrame - inFrame;
  const rate = `<rate><timebase>${timebase}</timebase><ntsc>${ntsc}</ntsc></rate>`;

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE xmeml>',
    '<xmeml version="4">',
    '  <sequence>',
    `    <name>${escapeXml(clip.name)}</name>`,
    `    <duration>${duration}</duration>`,
    `    ${rate}`,
    '    <media>',
    '      <video>',
    '        <track>',
    '          <clipitem id="clipitem-1">',
    `            <name>${escapeXml(clip.name)}</name>`,
    `            ${rate}`,
    '            <start>0</start>',
    `            <end>${duration}</end>`,
    `            <in>${inFrame}</in>`,
    `            <out>${outFrame}</out>`,
    '            <file id="file-1">',
    `              <name>${escapeXml(fileStem(clip.videoPath))}</name>`,
    `              <pathurl>${escapeXml(pathToFileURL(clip.videoPath).href)}</pathurl>`,
    '            </file>',
    '          </clipitem>',
    '        </track>',
    '      </video>',
    '    </media>',
    '  </sequence>',
    '</xmeml>',
    '',
  ].join('\n');
}

/**
 * Adobe Premiere Pro: imports sequences from FCP7 XML files
 */
export class PremiereIntegration extends FileDropEditor {
  readonly name = 'premiere';
  readonly label = 'Premiere Pro';
  protected readonly fileExtension = 'xml';

  protected render(clip: ClipRequest, frameRate: number): string {
    return renderXmeml(clip, frameRate);
  }
}
