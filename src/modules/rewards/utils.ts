import { setTimeout as delay } from 'timers/promises';
import { CancelledError, isAbortError } from './errors.js';
import type { RetryPolicy } from './types.js';

export type RewardsLogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<RewardsLogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export const rewardsLogger = {
  debug(message: string, context?: Record<string, unknown>) {
    writeLog('debug', message, context);
  },
  info(message: string, context?: Record<string, unknown>) {
    writeLog('info', message, context);
  },
  warn(message: string, context?: Record<string, unknown>) {
    writeLog('warn', message, context);
  },
  error(message: string, context?: Record<string, unknown>) {
    writeLog('error', message, context);
  }
};

/**
 * Resolves after `ms`, or rejects with {@link CancelledError} as soon as `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new CancelledError();
  }
  try {
    await delay(Math.max(0, ms), undefined, { signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw new CancelledError();
    }
    throw error;
  }
}

/**
 * `min(base * 2^attempt, max)` scaled by a factor drawn from `[1 - jitter, 1 + jitter]`.
 * `attempt` is zero-based.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const base = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const factor = 1 - policy.jitterRatio + 2 * policy.jitterRatio * random();
  return base * factor;
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/** Aborts the returned signal when any input aborts. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) {
      continue;
    }
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}

/**
 * Waits on a shared promise without letting one caller's cancellation
 * cancel the work other callers are waiting on.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function redactId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}…` : id;
}

function currentLevel(): RewardsLogLevel | 'silent' {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return raw;
  }
  return 'info';
}

function writeLog(level: RewardsLogLevel, message: string, context?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
    return;
  }

  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context
  };

  const output = JSON.stringify(payload);
  if (level === 'error') {
    console.error(output);
    return;
  }
  if (level === 'warn') {
    console.warn(output);
    return;
  }
  console.log(output);
}
