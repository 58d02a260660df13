export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}

export function formatUtc(ts: number): string {
  return new Date(ts).toISOString().replace('T', ' ').slice(0, 16) + ' UTC';
}
