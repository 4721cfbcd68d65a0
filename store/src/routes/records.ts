import { Router, Request, Response } from 'express';
import path from 'path';
import fs from 'fs';
import type { RecordUnit } from '@initrack/common';

// Configuration records posted by tracked classes.
// Storage: <dataDir>/<project>/<initClass>/records.jsonl, one RecordUnit per line.

export function createRecordsRouter(DATA_DIR: string) {
  const router = Router();

  function ensureDir(p: string) {
    if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true });
  }

  function sanitize(s: string) {
    return String(s || 'default').replace(/[^a-zA-Z0-9._-]/g, '_');
  }

  function recordsFile(project: string, initClass: string) {
    return path.join(DATA_DIR, sanitize(project), sanitize(initClass), 'records.jsonl');
  }

  function isValidUnit(body: unknown): { ok: true; unit: RecordUnit } | { ok: false; error: string } {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) return { ok: false, error: 'body must be a JSON object' };
    const project: unknown = Reflect.get(body, 'project');
    const timestamp: unknown = Reflect.get(body, 'timestamp');
    const record: unknown = Reflect.get(body, 'record');
    if (typeof project !== 'string' || !project) return { ok: false, error: 'project must be non-empty string' };
    if (typeof timestamp !== 'number') return { ok: false, error: 'timestamp must be a number' };
    if (typeof record !== 'object' || record === null || Array.isArray(record)) return { ok: false, error: 'record must be an object' };
    const initClass: unknown = Reflect.get(record, 'initClass');
    if (typeof initClass !== 'string' || !initClass) return { ok: false, error: 'record.initClass must be non-empty string' };
    return { ok: true, unit: { project, initClass, timestamp, record: { ...record, initClass } } };
  }

  // Torn or foreign lines are skipped
  function parseLine(line: string): RecordUnit | undefined {
    try {
      return JSON.parse(line);
    } catch {
      return undefined;
    }
  }

  function readUnits(project: string, initClass: string): RecordUnit[] {
    const file = recordsFile(project, initClass);
    if (!fs.existsSync(file)) return [];
    const units: RecordUnit[] = [];
    for (const line of fs.readFileSync(file, 'utf8').split('\n')) {
      if (!line.trim()) continue;
      const unit = parseLine(line);
      if (unit) units.push(unit);
    }
    return units;
  }

  function queryKey(req: Request, res: Response): { project: string; initClass: string } | undefined {
    const { project, initClass } = req.query;
    if (typeof project !== 'string' || !project || typeof initClass !== 'string' || !initClass) {
      res.status(400).json({ error: 'project and initClass query parameters are required' });
      return undefined;
    }
    return { project, initClass };
  }

  // POST /api/records
  router.post('/records', (req: Request, res: Response) => {
    const valid = isValidUnit(req.body);
    if (!valid.ok) return res.status(400).json({ error: valid.error });
    try {
      const file = recordsFile(valid.unit.project, valid.unit.initClass);
      ensureDir(path.dirname(file));
      fs.appendFileSync(file, JSON.stringify(valid.unit) + '\n', 'utf8');
      return res.status(201).json({ ok: true });
    } catch (err) {
      return res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  // GET /api/records?project=...&initClass=...
  router.get('/records', (req: Request, res: Response) => {
    const key = queryKey(req, res);
    if (!key) return;
    try {
      res.json({ ok: true, records: readUnits(key.project, key.initClass) });
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  // GET /api/records/latest?project=...&initClass=...
  router.get('/records/latest', (req: Request, res: Response) => {
    const key = queryKey(req, res);
    if (!key) return;
    try {
      const units = readUnits(key.project, key.initClass);
      const last = units[units.length - 1];
      if (!last) return res.status(404).json({ error: `no records for ${key.project}/${key.initClass}` });
      return res.json({ ok: true, record: last });
    } catch (err) {
      return res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return router;
}
