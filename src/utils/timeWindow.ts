export function timeDiffSeconds(t1: Date, t2: Date): number {
  return Math.abs(t1.getTime() - t2.getTime()) / 1000;
}

/**
 * True when the two instants are at most windowSeconds apart.
 * A zero window only admits identical instants.
 */
export function withinWindow(t1: Date, t2: Date, windowSeconds: number): boolean {
  return timeDiffSeconds(t1, t2) <= windowSeconds;
}

export function isWithinInterval(timestamp: Date, start: Date, end: Date): boolean {
  const value = timestamp.getTime();
  return value >= start.getTime() && value <= end.getTime();
}
