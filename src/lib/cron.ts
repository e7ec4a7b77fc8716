/**
 * Map a polling interval to a node-cron expression.
 *
 * Only intervals that cron can express as an even step are accepted: a
 * divisor of 60 minutes, or a whole number of hours that divides 24.
 * Returns null for anything else.
 */
export function intervalToCron(minutes: number): string | null {
  if (!Number.isInteger(minutes) || minutes <= 0) return null;

  if (minutes < 60) {
    if (60 % minutes !== 0) return null;
    return minutes === 1 ? '* * * * *' : `*/${minutes} * * * *`;
  }

  if (minutes % 60 !== 0) return null;
  const hours = minutes / 60;

  if (hours === 1) return '0 * * * *';
  if (hours === 24) return '0 0 * * *';
  if (hours < 24 && 24 % hours === 0) return `0 */${hours} * * *`;
  return null;
}
