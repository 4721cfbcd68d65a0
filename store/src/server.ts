import path from 'path';
import fs from 'fs';
import { createApp } from './index';

// Entry point of the record store service.

const PORT = process.env.PORT ? Number(process.env.PORT) : 3300;
const DATA_DIR = process.env.INITRACK_DATA_DIR || path.join(__dirname, '..', 'data');

if (!fs.existsSync(DATA_DIR)) fs.mkdirSync(DATA_DIR, { recursive: true });

createApp(DATA_DIR).listen(PORT, () => {
  console.log(`record store listening on http://localhost:${PORT}`);
});
