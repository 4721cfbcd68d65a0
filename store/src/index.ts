import express from 'express';
import { createRecordsRouter } from './routes/records';

// Express app storing configuration records; mounted under /api.
export function createApp(dataDir: string) {
  const app = express();
  app.use(express.json({ limit: '10mb' }));
  app.use('/api', createRecordsRouter(dataDir));
  return app;
}
