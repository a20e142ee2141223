import { Router, Request, Response } from 'express';
import { library } from '../library';
import { clipFromCue, EDITOR_NAMES, EditorName, EditorReadiness, getEditorIntegration } from '../editors';
import { config } from '../config';
import { asyncHandler, readCueReference } from './middleware';

const router = Router();

/**
 * GET /api/editors
 * List editor integrations and whether they are ready
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const editors: Array<{ name: EditorName; label: string } & EditorReadiness> = [];
    for (const name of EDITOR_NAMES) {
      const editor = getEditorIntegration(name);
      editors.push({ name, label: editor.label, ...(await editor.checkReadiness()) });
    }
    res.json({ editors });
  })
);

/**
 * POST /api/editors/:editor/clip
 * Send the range of a cue, with handles, to an editor
 */
router.post(
  '/:editor/clip',
  asyncHandler(async (req: Request, res: Response) => {
    const editor = getEditorIntegration(req.params.editor ?? '');
    const reference = readCueReference(req.body);
    if (!reference) {
      res.status(400).json({
        error: 'Missing required fields',
        required: ['subtitlePath', 'cueIndex'],
      });
      return;
    }

    const target = library.resolvePlayback(reference.subtitlePath, reference.cueIndex);
    const result = await editor.importClip(clipFromCue(target.videoPath, target.cue, config.editorHandleMs));
    res.status(201).json(result);
  })
);

/**
 * POST /api/editors/:editor/media
 * Send a whole video to an editor
 */
router.post(
  '/:editor/media',
  asyncHandler(async (req: Request, res: Response) => {
    const editor = getEditorIntegration(req.params.editor ?? '');
    const body: unknown = req.body;
    const videoPath =
      typeof body === 'object' && body !== null && 'videoPath' in body ? body.videoPath : undefined;

    if (typeof videoPath !== 'string' || !library.isKnownVideo(videoPath)) {
      res.status(400).json({ error: 'videoPath must be a video file of the library' });
      return;
    }

    const result = await editor.importMedia(videoPath);
    res.status(201).json(result);
  })
);

export default router;
