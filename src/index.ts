import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import apiRouter from './api';
import { config } from './config';
import { library, NoVideoMatchError, NotFoundError } from './library';
import { UnknownEditorError } from './editors';

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// API routes
app.use('/api', apiRouter);

// Error handling middleware
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error('Error:', err.message);

  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }

  if (err instanceof NoVideoMatchError) {
    res.status(409).json({ error: err.message, subtitlePath: err.subtitlePath });
    return;
  }

  if (err instanceof UnknownEditorError) {
    res.status(400).json({ error: err.message });
    return;
  }

  res.status(500).json({
    error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
  });
});

// 404 handler
app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

if (config.mediaDirectories.length === 0) {
  console.warn('No media directories configured; set MEDIA_DIRECTORIES');
}
library.reload();

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 Moment Navigator`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Player: ${config.player}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health                  - Check service status`);
  console.info(`   - GET  /api/shows                   - List shows`);
  console.info(`   - POST /api/shows/reload            - Rescan media directories`);
  console.info(`   - GET  /api/shows/:name/matches     - Subtitle to video pairing`);
  console.info(`   - POST /api/shows/:name/select      - Make a show active`);
  console.info(`   - GET  /api/shows/:name/search?q=   - Search subtitles`);
  console.info(`   - POST /api/playback                - Open a cue in the player`);
  console.info(`   - GET  /api/editors                 - Editor readiness`);
  console.info(`   - POST /api/editors/:editor/clip    - Send a cue to an editor`);
  console.info(`   - POST /api/editors/:editor/media   - Send a video to an editor`);
  console.info(`\n`);
});

export default app;
