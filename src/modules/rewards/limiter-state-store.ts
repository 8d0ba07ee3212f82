import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { RateLimiterState } from './types.js';
import { rewardsLogger } from './utils.js';

const STATE_FILE_VERSION = 1;

export interface LimiterStateStore {
  /** Null when nothing usable was saved. */
  load(): Promise<RateLimiterState | null>;
  save(state: RateLimiterState): Promise<void>;
}

/**
 * Keeps the limiter counters in one JSON file. Saves run one at a time and
 * replace the file by rename, so a reader never sees a half-written record.
 */
export class JsonFileLimiterStateStore implements LimiterStateStore {
  private readonly filePath: string;
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<RateLimiterState | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoWithCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      rewardsLogger.warn('[LimiterStateStore] State file is not valid JSON, ignoring it', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    const state = parseStateFile(parsed);
    if (!state) {
      rewardsLogger.warn('[LimiterStateStore] State file has an unexpected shape, ignoring it', {
        filePath: this.filePath
      });
    }
    return state;
  }

  async save(state: RateLimiterState): Promise<void> {
    const write = async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      const body = { version: STATE_FILE_VERSION, rateLimiter: state };
      await writeFile(tempPath, JSON.stringify(body, null, 2), 'utf8');
      await rename(tempPath, this.filePath);
    };
    this.saveQueue = this.saveQueue.then(write, write);
    await this.saveQueue;
  }
}

export function parseStateFile(raw: unknown): RateLimiterState | null {
  if (!isRecord(raw) || raw.version !== STATE_FILE_VERSION) {
    return null;
  }
  const record = raw.rateLimiter;
  if (!isRecord(record)) {
    return null;
  }

  const hourlyCount = readFiniteNumber(record, 'hourlyCount');
  const hourlyWindowStart = readFiniteNumber(record, 'hourlyWindowStart');
  const burstCount = readFiniteNumber(record, 'burstCount');
  const burstWindowStart = readFiniteNumber(record, 'burstWindowStart');
  if (hourlyCount === null || hourlyWindowStart === null || burstCount === null || burstWindowStart === null) {
    return null;
  }

  return { hourlyCount, hourlyWindowStart, burstCount, burstWindowStart };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function readFiniteNumber(record: Record<string, unknown>, key: keyof RateLimiterState): number | null {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isErrnoWithCode(error: unknown, code: string): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === code;
}
