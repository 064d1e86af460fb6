/**
 * Daily run-time helpers. Pure: the queue layer decides when to call the
 * core, these only compute when that should be.
 */

export interface RunTime {
  hour: number;
  minute: number;
}

/**
 * Parses "HH:MM" (24h)
 * @throws Error if the value is not a valid time of day
 */
export function parseRunTime(value: string): RunTime {
  const m = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!m) throw new Error(`Invalid run time "${value}", expected HH:MM`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) {
    throw new Error(`Invalid run time "${value}", expected HH:MM`);
  }
  return { hour, minute };
}

/**
 * Next UTC instant strictly after `now` that falls on the daily run time
 */
export function nextRunAt(now: Date, runTime: string): Date {
  const { hour, minute } = parseRunTime(runTime);
  const next = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate(),
      hour,
      minute,
      0,
      0,
    ),
  );
  if (next.getTime() <= now.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }
  return next;
}

/**
 * Cron pattern firing once a day at the run time, ex: "0 2 * * *"
 */
export function dailyCronPattern(runTime: string): string {
  const { hour, minute } = parseRunTime(runTime);
  return `${minute} ${hour} * * *`;
}
