/**
 * Run ids sort by start time and are path-safe: `2026-01-03T22-22-05-ab12cd`.
 * The suffix separates runs started within the same second.
 */
export const makeRunId = (now: Date = new Date(), suffix?: string): string => {
  if (Number.isNaN(now.getTime())) {
    throw new Error('Invalid run start time');
  }
  const isoSecond = now.toISOString().slice(0, 19).replace(/:/g, '-');
  const tail = suffix ?? Math.random().toString(16).slice(2, 8).padEnd(6, '0');
  return `${isoSecond}-${tail}`;
};

export const runIdToTimestamp = (runId: string): string | undefined => {
  const match = runId.match(/^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})/);
  if (!match) return undefined;
  return `${match[1]}T${match[2]}:${match[3]}:${match[4]}Z`;
};
