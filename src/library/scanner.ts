import fs, { Dirent, Stats } from 'fs';
import path from 'path';
import { MediaExtensions, Show } from './types';

/**
 * Files grouped under a show folder, before they are told apart by extension
 */
export interface ShowGroup {
  name: string;
  root: string;
  files: string[];
}

/**
 * Lists every file beneath a directory, depth first, in sorted order.
 * Hidden entries are skipped, unreadable directories are logged and skipped.
 * Symlinks are followed; broken links are skipped and a directory reached
 * twice through links is only listed once.
 */
export function walkFiles(root: string, visited: Set<string> = new Set()): string[] {
  const files: string[] = [];

  let entries: Dirent[];
  try {
    const real = fs.realpathSync(root);
    if (visited.has(real)) return files;
    visited.add(real);
    entries = fs.readdirSync(root, { withFileTypes: true });
  } catch (error) {
    console.warn(`Cannot read directory ${root}:`, error instanceof Error ? error.message : error);
    return files;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;

    const fullPath = path.join(root, entry.name);
    const kind = entry.isSymbolicLink() ? linkTargetKind(fullPath) : entry;
    if (!kind) continue;

    if (kind.isDirectory()) {
      files.push(...walkFiles(fullPath, visited));
    } else if (kind.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

function linkTargetKind(linkPath: string): Stats | null {
  try {
    return fs.statSync(linkPath);
  } catch (error) {
    console.warn(`Skipping broken link ${linkPath}:`, error instanceof Error ? error.message : error);
    return null;
  }
}

/**
 * Groups files by the first folder below the root. Files lying directly in
 * the root belong to no show and are ignored.
 */
export function groupByTopLevelFolder(root: string, files: string[]): ShowGroup[] {
  const groups = new Map<string, ShowGroup>();

  for (const file of files) {
    const relative = path.relative(root, file);
    const segments = relative.split(path.sep);
    const name = segments[0];

    if (segments.length < 2 || !name || name === '..') continue;

    let group = groups.get(name);
    if (!group) {
      group = { name, root, files: [] };
      groups.set(name, group);
    }
    group.files.push(file);
  }

  return [...groups.values()];
}

/**
 * Returns which kind of media a file is by its extension. The longest
 * configured extension wins, so ".mp4.srt" is read as a subtitle.
 */
export function classifyFile(
  filePath: string,
  extensions: MediaExtensions
): 'subtitle' | 'video' | null {
  const lower = filePath.toLowerCase();
  let kind: 'subtitle' | 'video' | null = null;
  let longest = 0;

  for (const ext of extensions.subtitle) {
    if (lower.endsWith(ext) && ext.length > longest) {
      kind = 'subtitle';
      longest = ext.length;
    }
  }
  for (const ext of extensions.video) {
    if (lower.endsWith(ext) && ext.length > longest) {
      kind = 'video';
      longest = ext.length;
    }
  }

  return kind;
}

/**
 * Turns grouped files into shows. Groups without subtitles are dropped since
 * there is nothing to search in them.
 */
export function buildShows(groups: ShowGroup[], extensions: MediaExtensions): Show[] {
  const shows: Show[] = [];

  for (const group of groups) {
    const subtitlePaths: string[] = [];
    const videoPaths: string[] = [];

    for (const file of group.files) {
      const kind = classifyFile(file, extensions);
      if (kind === 'subtitle') subtitlePaths.push(file);
      else if (kind === 'video') videoPaths.push(file);
    }

    if (subtitlePaths.length === 0) continue;

    shows.push({
      name: group.name,
      root: group.root,
      subtitlePaths: subtitlePaths.sort(),
      videoPaths: videoPaths.sort(),
    });
  }

  return shows;
}

/**
 * Scans every registered media directory for shows
 */
export function scanLibrary(roots: string[], extensions: MediaExtensions): Show[] {
  const shows: Show[] = [];
  const seen = new Set<string>();

  for (const root of roots) {
    const groups = groupByTopLevelFolder(root, walkFiles(root));

    for (const show of buildShows(groups, extensions)) {
      // Same folder name under two roots
      let name = show.name;
      if (seen.has(name)) {
        const suffixed = `${show.name} [${path.basename(root)}]`;
        name = suffixed;
        for (let n = 2; seen.has(name); n++) {
          name = `${suffixed} (${n})`;
        }
      }
      seen.add(name);
      shows.push({ ...show, name });
    }
  }

  return shows.sort((a, b) => a.name.localeCompare(b.name));
}
