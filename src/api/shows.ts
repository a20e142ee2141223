import { Router, Request, Response } from 'express';
import { library } from '../library';
import { asyncHandler, readQueryString } from './middleware';

const router = Router();

/**
 * GET /api/shows
 * List all shows
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    res.json({ shows: library.listShows(), activeShow: library.activeShow });
  })
);

/**
 * POST /api/shows/reload
 * Rescan the media directories
 */
router.post(
  '/reload',
  asyncHandler(async (_req: Request, res: Response) => {
    const shows = library.reload();
    res.json({ shows });
  })
);

/**
 * GET /api/shows/:name/matches
 * Get the subtitle to video pairing of a show
 */
router.get(
  '/:name/matches',
  asyncHandler(async (req: Request, res: Response) => {
    const name = req.params.name ?? '';
    res.json({ show: name, matches: library.getMatches(name) });
  })
);

/**
 * POST /api/shows/:name/select
 * Make a show the active one without parsing it yet
 */
router.post(
  '/:name/select',
  asyncHandler(async (req: Request, res: Response) => {
    const session = library.selectShow(req.params.name ?? '');
    res.json({ activeShow: session.show.name, indexed: session.isIndexed });
  })
);

/**
 * GET /api/shows/:name/search?q=keyword
 * Search the subtitles of a show
 */
router.get(
  '/:name/search',
  asyncHandler(async (req: Request, res: Response) => {
    const result = library.search(req.params.name ?? '', readQueryString(req.query.q));
    res.json(result);
  })
);

export default router;
