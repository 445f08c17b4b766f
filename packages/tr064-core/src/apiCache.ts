import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createNullLogger, type ModuleLogger } from './logger';
import { CacheError } from './errors';
import type { ApiSnapshot } from './types';

export const DEFAULT_CACHE_DIRECTORY = '.tr064';
const CACHE_FILE_SUFFIX = '_cache.json';

export interface ApiCacheOptions {
  // כתובת הנתב, עם או בלי scheme
  address: string;
  // ריק או לא מוגדר: ~/.tr064
  directory?: string;
  logger?: ModuleLogger;
}

/**
 * @hebrew מטמון הסכמה בקובץ JSON, אחד לכל כתובת נתב.
 */
export class ApiCache {
  readonly filePath: string;
  private readonly logger: ModuleLogger;

  constructor(options: ApiCacheOptions) {
    const host = options.address.split('//').pop() ?? options.address;
    const fileName = `${host.replace(/[^A-Za-z0-9-]/g, '_')}${CACHE_FILE_SUFFIX}`;
    const directory = options.directory || path.join(os.homedir(), DEFAULT_CACHE_DIRECTORY);
    this.filePath = path.join(directory, fileName);
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * @hebrew קורא את תוכן המטמון.
   * @returns null כאשר הקובץ לא קיים.
   * @throws CacheError כאשר הקובץ אינו JSON תקין.
   */
  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.debug(`[ApiCache] no cache file at ${this.filePath}`);
        return null;
      }
      throw new CacheError(`Unable to read cache file '${this.filePath}'`, { cause: error });
    }
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new CacheError(`Unknown cache format in '${this.filePath}'`, { cause: error });
    }
  }

  async write(snapshot: ApiSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(snapshot), 'utf-8');
    this.logger.debug(`[ApiCache] cache written to ${this.filePath}`);
  }
}
