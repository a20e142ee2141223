import { Router } from 'express';
import showsRouter from './shows';
import playbackRouter from './playback';
import editorsRouter from './editors';
import healthRouter from './health';

const router = Router();

router.use('/shows', showsRouter);
router.use('/playback', playbackRouter);
router.use('/editors', editorsRouter);
router.use('/health', healthRouter);

export default router;
