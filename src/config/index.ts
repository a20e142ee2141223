import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Library
  mediaDirectories: string[];
  subtitleExtensions: string[];
  videoExtensions: string[];
  nameNoiseTokens: string[];

  // Player
  player: string;
  playerPath: string;

  // Editors
  ffmpegPath: string;
  editorImportDir: string;
  editorHandleMs: number;
}

export const DEFAULT_SUBTITLE_EXTENSIONS = ['.srt', '.txt'];

export const DEFAULT_VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.avi', '.mov', '.wmv', '.webm', '.m4v'];

/**
 * Tokens that release names carry but that say nothing about the episode
 */
export const DEFAULT_NOISE_TOKENS = [
  '480p',
  '576p',
  '720p',
  '1080p',
  '1080i',
  '2160p',
  '4k',
  'uhd',
  'hdr',
  'x264',
  'x265',
  'h264',
  'h265',
  'hevc',
  'xvid',
  'aac',
  'ac3',
  'dts',
  'bluray',
  'brrip',
  'bdrip',
  'webrip',
  'webdl',
  'hdtv',
  'dvdrip',
  'remux',
  'proper',
  'repack',
];

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvList(key: string, defaultValue: string[], separator: string = ','): string[] {
  const value = process.env[key];
  if (value === undefined || !value.trim()) return defaultValue;
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter(Boolean);
}

function toExtensions(values: string[]): string[] {
  return values.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // Library
    mediaDirectories: getEnvList('MEDIA_DIRECTORIES', [], path.delimiter).map((dir) =>
      path.resolve(dir)
    ),
    subtitleExtensions: toExtensions(getEnvList('SUBTITLE_EXTENSIONS', DEFAULT_SUBTITLE_EXTENSIONS)),
    videoExtensions: toExtensions(getEnvList('VIDEO_EXTENSIONS', DEFAULT_VIDEO_EXTENSIONS)),
    nameNoiseTokens: getEnvList('NAME_NOISE_TOKENS', DEFAULT_NOISE_TOKENS).map((token) =>
      token.toLowerCase()
    ),

    // Player
    player: getEnvString('PLAYER', 'mpc-hc'),
    playerPath: getEnvString('PLAYER_PATH', ''),

    // Editors
    ffmpegPath: getEnvString('FFMPEG_PATH', ''),
    editorImportDir: getEnvString('EDITOR_IMPORT_DIR', `${dataDir}/editor-imports`),
    editorHandleMs: getEnvNumber('EDITOR_HANDLE_MS', 1000),
  };
}

export const config = loadConfig();
