import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { atomicWriteJson, readJsonFile } from './atomic-write';

describe('atomic-write', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-write-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write JSON and create missing directories', async () => {
    const file = path.join(dir, 'nested', 'jobs.json');

    await atomicWriteJson(file, { jobs: [] });

    expect(await fs.readFile(file, 'utf-8')).toBe('{\n  "jobs": []\n}');
    expect(await fs.readdir(path.join(dir, 'nested'))).toEqual(['jobs.json']);
  });

  it('should write compact JSON when asked', async () => {
    const file = path.join(dir, 'user.json');

    await atomicWriteJson(file, { a: 1 }, { pretty: false });

    expect(await fs.readFile(file, 'utf-8')).toBe('{"a":1}');
  });

  it('should read back what was written', async () => {
    const file = path.join(dir, 'user.json');
    await atomicWriteJson(file, { timezone: 'UTC' });

    expect(await readJsonFile(file)).toEqual({ timezone: 'UTC' });
  });

  it('should return null for a missing file', async () => {
    expect(await readJsonFile(path.join(dir, 'absent.json'))).toBeNull();
  });

  it('should reject on malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{not json', 'utf-8');

    await expect(readJsonFile(file)).rejects.toThrow(SyntaxError);
  });
});
