/**
 * Stage timer: each lap records the time since the previous lap
 */
export class Timer {
  private readonly startTime: number;
  private lastMark: number;
  private laps: Map<string, number> = new Map();

  constructor() {
    this.startTime = performance.now();
    this.lastMark = this.startTime;
  }

  lap(label: string): number {
    const now = performance.now();
    const duration = now - this.lastMark;
    this.lastMark = now;
    this.laps.set(label, Math.round(duration));
    return duration;
  }

  get elapsed(): number {
    return performance.now() - this.startTime;
  }

  /** Rounded milliseconds per lap label */
  getLaps(): Record<string, number> {
    return Object.fromEntries(this.laps);
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
