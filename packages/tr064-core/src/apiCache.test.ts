import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ApiCache } from './apiCache';
import { CacheError } from './errors';

describe('ApiCache', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'tr064-api-cache-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('names the file after the router address', () => {
    expect(new ApiCache({ address: 'http://192.168.178.1', directory }).filePath)
      .toBe(path.join(directory, '192_168_178_1_cache.json'));
    expect(new ApiCache({ address: 'router.test' }).filePath)
      .toBe(path.join(os.homedir(), '.tr064', 'router_test_cache.json'));
  });

  it('returns null without a cache file', async () => {
    await expect(new ApiCache({ address: '192.168.178.1', directory }).read()).resolves.toBeNull();
  });

  it('reads back what it wrote, creating the directory', async () => {
    const cache = new ApiCache({ address: '192.168.178.1', directory: path.join(directory, 'nested') });
    await cache.write({ descriptions: [] });
    await expect(cache.read()).resolves.toEqual({ descriptions: [] });
  });

  it('raises CacheError for content that is not JSON', async () => {
    const cache = new ApiCache({ address: '192.168.178.1', directory });
    fs.writeFileSync(cache.filePath, '{"descriptions": [', 'utf-8');
    await expect(cache.read()).rejects.toBeInstanceOf(CacheError);
  });
});
