import fs from 'fs';
import { Cue, ParsedSubtitle } from './types';
import { ParseError, SubtitleReadError } from './errors';

/**
 * Matches a timing line such as "00:01:02,500 --> 00:01:04,000".
 * Period separators and short fractions are accepted too.
 */
const TIMING_LINE = /^\s*(\d{1,3}:\d{2}:\d{2}[,.]\d{1,3})\s*-->\s*(\d{1,3}:\d{2}:\d{2}[,.]\d{1,3})/;

const MARKUP_TAG = /<[^>]*>/g;

/**
 * Reads the raw text of a subtitle file
 */
export type SubtitleReader = (subtitlePath: string) => string;

type BlockResult = { ok: true; startMs: number; endMs: number; text: string } | { ok: false };

/**
 * Converts an SRT timestamp (HH:MM:SS,mmm) to milliseconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm" or "HH:MM:SS.mmm"
 * @returns Elapsed time in milliseconds
 */
export function srtTimeToMs(timestamp: string): number {
  const match = /^(\d+):(\d{2}):(\d{2})[,.](\d{1,3})$/.exec(timestamp.trim());

  if (!match?.[1] || !match[2] || !match[3] || !match[4]) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  // "1,5" means 500ms, not 5ms
  const milliseconds = parseInt(match[4].padEnd(3, '0'), 10);

  if (minutes >= 60 || seconds >= 60) {
    throw new Error(`SRT timestamp out of range: ${timestamp}`);
  }

  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + milliseconds;
}

/**
 * Formats milliseconds as HH:MM:SS, dropping the fraction
 */
export function formatClockTime(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${seconds.toString().padStart(2, '0')}`
  );
}

/**
 * Removes HTML-like tags such as <i> or <font color="...">
 */
export function stripMarkup(text: string): string {
  return text.replace(MARKUP_TAG, '');
}

function splitBlocks(content: string): string[] {
  const normalized = content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n');

  return normalized.split(/\n(?:[ \t]*\n)+/).filter((block) => block.trim());
}

function readBlock(block: string): BlockResult {
  const lines = block.split('\n');
  const timingIndex = lines.findIndex((line) => TIMING_LINE.test(line));
  if (timingIndex === -1) {
    return { ok: false };
  }

  const timing = TIMING_LINE.exec(lines[timingIndex] ?? '');
  if (!timing?.[1] || !timing[2]) {
    return { ok: false };
  }

  let startMs: number;
  let endMs: number;
  try {
    startMs = srtTimeToMs(timing[1]);
    endMs = srtTimeToMs(timing[2]);
  } catch {
    return { ok: false };
  }

  if (startMs > endMs) {
    return { ok: false };
  }

  // Anything before the timing line (usually the index) is ignored
  const text = stripMarkup(lines.slice(timingIndex + 1).join('\n')).trim();

  return { ok: true, startMs, endMs, text };
}

function* readBlocks(content: string): Generator<BlockResult> {
  for (const block of splitBlocks(content)) {
    yield readBlock(block);
  }
}

/**
 * Lazily reads cues from subtitle content. Every iteration starts over from
 * the beginning of the content; malformed blocks are left out silently.
 */
export function cueSequence(content: string): Iterable<Cue> {
  return {
    *[Symbol.iterator]() {
      let index = 0;
      for (const block of readBlocks(content)) {
        if (!block.ok) continue;
        index++;
        yield { index, startMs: block.startMs, endMs: block.endMs, text: block.text };
      }
    },
  };
}

/**
 * Parses subtitle content into cues, counting the blocks that were skipped
 * @param content - The raw subtitle file content
 * @param subtitlePath - Used in the error message when nothing could be parsed
 * @throws ParseError when no cue at all could be recognized
 */
export function parseSubtitleContent(content: string, subtitlePath?: string): ParsedSubtitle {
  const cues: Cue[] = [];
  let skippedBlocks = 0;

  for (const block of readBlocks(content)) {
    if (!block.ok) {
      skippedBlocks++;
      continue;
    }

    cues.push({
      index: cues.length + 1,
      startMs: block.startMs,
      endMs: block.endMs,
      text: block.text,
    });
  }

  if (cues.length === 0) {
    const source = subtitlePath ?? 'subtitle content';
    throw new ParseError(
      `No recognizable cues in ${source} (${skippedBlocks} malformed blocks)`,
      subtitlePath ?? null,
      skippedBlocks
    );
  }

  return { cues, skippedBlocks };
}

export const readSubtitleFromDisk: SubtitleReader = (subtitlePath) =>
  fs.readFileSync(subtitlePath, 'utf-8');

/**
 * Reads and parses a subtitle file
 * @throws SubtitleReadError when the file cannot be read
 * @throws ParseError when the file holds no recognizable cue
 */
export function parseSubtitleFile(
  subtitlePath: string,
  reader: SubtitleReader = readSubtitleFromDisk
): ParsedSubtitle {
  let content: string;
  try {
    content = reader(subtitlePath);
  } catch (error) {
    throw new SubtitleReadError(subtitlePath, error);
  }

  return parseSubtitleContent(content, subtitlePath);
}
