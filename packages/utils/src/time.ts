/**
 * Time Utilities
 */

export type TimeUnit = 'MILLISECONDS' | 'SECONDS' | 'MINUTES' | 'HOURS' | 'DAYS';

export const DAY_MS = 24 * 60 * 60 * 1000;

const UNIT_MS: Record<TimeUnit, number> = {
  MILLISECONDS: 1,
  SECONDS: 1000,
  MINUTES: 60 * 1000,
  HOURS: 60 * 60 * 1000,
  DAYS: DAY_MS,
};

/**
 * Convert an amount of the given unit to milliseconds
 */
export function toMillis(amount: number, unit: TimeUnit): number {
  return amount * UNIT_MS[unit];
}

// Longest delay setTimeout honours; larger values fire after 1ms
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Sleep for a specified duration.
 * Resolves early (without rejecting) when the signal aborts. Delays beyond
 * the timer limit are waited out in slices until the deadline.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }

  const deadline = Date.now() + Math.max(0, ms);

  return new Promise(resolve => {
    let timer: NodeJS.Timeout | undefined;

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };

    const arm = () => {
      const remaining = deadline - Date.now();
      timer = remaining > MAX_TIMER_MS
        ? setTimeout(arm, MAX_TIMER_MS)
        : setTimeout(finish, Math.max(0, remaining));
    };

    signal?.addEventListener('abort', finish, { once: true });
    arm();
  });
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Format a byte count as MiB with one decimal
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
