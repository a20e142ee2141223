import { Router, Request, Response } from 'express';
import path from 'path';
import { library } from '../library';
import { createMediaLauncher, launchWithFallback } from '../player';
import { formatClockTime } from '../subtitles';
import { config } from '../config';
import { asyncHandler, readCueReference } from './middleware';

const router = Router();

/**
 * POST /api/playback
 * Open the video of a cue at the cue's start
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const reference = readCueReference(req.body);
    if (!reference) {
      res.status(400).json({
        error: 'Missing required fields',
        required: ['subtitlePath', 'cueIndex'],
      });
      return;
    }

    const target = library.resolvePlayback(reference.subtitlePath, reference.cueIndex);
    const launcher = createMediaLauncher(config.player, config.playerPath || undefined);
    const outcome = await launchWithFallback(launcher, target.videoPath, target.startMs);

    console.info(`Opening ${path.basename(target.videoPath)} at ${formatClockTime(target.startMs)}`);
    res.json({ target, outcome });
  })
);

export default router;
