import { Router, Request, Response } from 'express';
import { FFmpegProcessor } from '../video';
import { checkAllEditors } from '../editors';
import { library } from '../library';
import { config } from '../config';
import { asyncHandler } from './middleware';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const ffmpeg = new FFmpegProcessor();

    const ffprobeAvailable = ffmpeg.isAvailable();
    const ffprobeVersion = ffprobeAvailable ? ffmpeg.getVersion() : null;

    const editorStatus = await checkAllEditors();

    const allServicesOk = ffprobeAvailable && library.roots.length > 0;

    res.json({
      status: allServicesOk ? 'healthy' : 'degraded',
      services: {
        ffprobe: {
          available: ffprobeAvailable,
          version: ffprobeVersion,
        },
        player: {
          type: config.player,
          path: config.playerPath || null,
        },
        editors: Object.fromEntries(editorStatus),
      },
      library: {
        roots: library.roots,
        shows: library.listShows().length,
        activeShow: library.activeShow,
      },
    });
  })
);

export default router;
