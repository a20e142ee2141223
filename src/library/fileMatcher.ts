import { FileMatch, MatchStrategy, NormalizedName } from './types';
import { normalizeName, NormalizeOptions } from './nameNormalizer';

interface KeyedPath {
  path: string;
  key: NormalizedName;
}

interface Candidate {
  video: KeyedPath;
  score: number;
}

/**
 * Shorter paths first, then plain code-unit order
 */
function comparePaths(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function pickBest(candidates: Candidate[]): KeyedPath | null {
  let best: Candidate | null = null;

  for (const candidate of candidates) {
    if (
      !best ||
      candidate.score > best.score ||
      (candidate.score === best.score && comparePaths(candidate.video.path, best.video.path) < 0)
    ) {
      best = candidate;
    }
  }

  return best?.video ?? null;
}

function exactCandidates(subtitle: KeyedPath, pool: KeyedPath[]): Candidate[] {
  return pool
    .filter((video) => video.key.loose === subtitle.key.loose)
    .map((video) => ({ video, score: 0 }));
}

function containmentCandidates(subtitle: KeyedPath, pool: KeyedPath[]): Candidate[] {
  const tight = subtitle.key.tight;
  if (!tight) return [];

  const candidates: Candidate[] = [];
  for (const video of pool) {
    const videoTight = video.key.tight;
    if (!videoTight) continue;

    if (videoTight.includes(tight) || tight.includes(videoTight)) {
      // The shorter key is fully shared by the longer one
      candidates.push({ video, score: Math.min(tight.length, videoTight.length) });
    }
  }

  return candidates;
}

/**
 * Pairs every subtitle file with at most one video file.
 *
 * Subtitles are handled in sorted order. Each one first looks for a video with
 * an identical loose key, then for one whose tight key contains its own (or
 * the reverse), preferring the longest shared key. Ties go to the shortest,
 * then lexicographically smallest, path. A claimed video leaves the pool, so
 * no video is ever paired twice.
 *
 * @returns One entry per distinct subtitle path, in processing order
 */
export function matchFiles(
  subtitlePaths: string[],
  videoPaths: string[],
  options: NormalizeOptions = {}
): Map<string, FileMatch> {
  const subtitles = [...new Set(subtitlePaths)].sort();
  let pool: KeyedPath[] = [...new Set(videoPaths)].map((path) => ({
    path,
    key: normalizeName(path, options),
  }));

  const matches = new Map<string, FileMatch>();

  for (const subtitlePath of subtitles) {
    const subtitle: KeyedPath = { path: subtitlePath, key: normalizeName(subtitlePath, options) };

    let strategy: MatchStrategy = 'exact';
    let video = pickBest(exactCandidates(subtitle, pool));

    if (!video) {
      strategy = 'containment';
      video = pickBest(containmentCandidates(subtitle, pool));
    }

    if (!video) {
      matches.set(subtitlePath, { subtitlePath, videoPath: null, strategy: 'none' });
      continue;
    }

    const claimed = video.path;
    pool = pool.filter((candidate) => candidate.path !== claimed);
    matches.set(subtitlePath, { subtitlePath, videoPath: claimed, strategy });
  }

  return matches;
}
