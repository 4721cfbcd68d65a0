import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { createApp } from '../src/index';

let server: Server;
let base: string;
let dataDir: string;

beforeAll((done) => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'initrack-store-'));
  server = createApp(dataDir).listen(0, '127.0.0.1', () => {
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}/api`;
    done();
  });
});

afterAll((done) => {
  server.close(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
    done();
  });
});

function post(body: unknown) {
  return fetch(`${base}/records`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const unit = (timestamp: number, record: Record<string, unknown>) => ({
  project: 'my proj',
  initClass: 'M',
  timestamp,
  record: { ...record, initClass: 'M' },
});

test('stored records are listed in arrival order', async () => {
  const first = await post(unit(1, { c: 9, initArgs: [1] }));
  expect(first.status).toBe(201);
  expect(await first.json()).toEqual({ ok: true });
  expect((await post(unit(2, { c: 4 }))).status).toBe(201);

  expect(fs.existsSync(path.join(dataDir, 'my_proj', 'M', 'records.jsonl'))).toBe(true);

  const list = await fetch(`${base}/records?project=my%20proj&initClass=M`);
  expect(list.status).toBe(200);
  expect(await list.json()).toEqual({ ok: true, records: [unit(1, { c: 9, initArgs: [1] }), unit(2, { c: 4 })] });

  const latest = await fetch(`${base}/records/latest?project=my%20proj&initClass=M`);
  expect(await latest.json()).toEqual({ ok: true, record: unit(2, { c: 4 }) });
});

test('the unit class name comes from the record', async () => {
  const res = await post({ project: 'renamed', initClass: 'Ignored', timestamp: 3, record: { initClass: 'Real' } });
  expect(res.status).toBe(201);
  const latest = await fetch(`${base}/records/latest?project=renamed&initClass=Real`);
  expect(await latest.json()).toEqual({
    ok: true,
    record: { project: 'renamed', initClass: 'Real', timestamp: 3, record: { initClass: 'Real' } },
  });
});

test.each([
  [[1, 2], 'body must be a JSON object'],
  [{ project: '', timestamp: 1, record: { initClass: 'M' } }, 'project must be non-empty string'],
  [{ project: 'p', timestamp: 'now', record: { initClass: 'M' } }, 'timestamp must be a number'],
  [{ project: 'p', timestamp: 1, record: null }, 'record must be an object'],
  [{ project: 'p', timestamp: 1, record: { initClass: '' } }, 'record.initClass must be non-empty string'],
])('invalid unit %j is rejected', async (body, error) => {
  const res = await post(body);
  expect(res.status).toBe(400);
  expect(await res.json()).toEqual({ error });
});

test('queries need both project and class', async () => {
  const res = await fetch(`${base}/records?project=p`);
  expect(res.status).toBe(400);
  expect(await res.json()).toEqual({ error: 'project and initClass query parameters are required' });
});

test('latest is 404 when nothing was stored', async () => {
  const res = await fetch(`${base}/records/latest?project=empty&initClass=None`);
  expect(res.status).toBe(404);
  expect(await res.json()).toEqual({ error: 'no records for empty/None' });
});

test('torn lines are skipped when reading', async () => {
  const file = path.join(dataDir, 'torn', 'T', 'records.jsonl');
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '{"project":"torn","initClass":"T","timestamp":1,"record":{"initClass":"T"}}\n{"proj', 'utf8');
  const res = await fetch(`${base}/records?project=torn&initClass=T`);
  expect(await res.json()).toEqual({
    ok: true,
    records: [{ project: 'torn', initClass: 'T', timestamp: 1, record: { initClass: 'T' } }],
  });
});
