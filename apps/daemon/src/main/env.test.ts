import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getActiveProvider, loadEnv } from './env';

describe('loadEnv', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'sortbox-env-'));
  });

  afterEach(async () => {
    delete process.env.SORTBOX_ENV_PROBE;
    await fs.promises.rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads the first existing candidate', async () => {
    const envPath = path.join(dir, '.env');
    await fs.promises.writeFile(envPath, 'SORTBOX_ENV_PROBE=from-file\n');

    expect(loadEnv([path.join(dir, 'missing.env'), envPath])).toBe(envPath);
    expect(process.env.SORTBOX_ENV_PROBE).toBe('from-file');
  });

  it('returns null when no candidate exists', () => {
    expect(loadEnv([path.join(dir, 'missing.env'), ''])).toBeNull();
  });
});

describe('getActiveProvider', () => {
  it('prefers OpenRouter, then OpenAI', () => {
    expect(getActiveProvider({ OPENROUTER_API_KEY: 'a', OPENAI_API_KEY: 'b' })).toBe('openrouter');
    expect(getActiveProvider({ OPENAI_API_KEY: 'b' })).toBe('openai');
    expect(getActiveProvider({ OPENAI_API_KEY: '  ' })).toBeNull();
  });
});
