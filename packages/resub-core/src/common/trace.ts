export type Stopwatch = {
  elapsedMs(): number;
};

export function startStopwatch(): Stopwatch {
  const startedAt = process.hrtime.bigint();
  return {
    elapsedMs: () => Number(process.hrtime.bigint() - startedAt) / 1e6,
  };
}

/** Seconds above one second, otherwise milliseconds with one or two decimals. */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) {
    return `${ms}ms`;
  }
  return ms >= 1000 ? `${(ms / 1000).toFixed(2)}s` : `${ms.toFixed(ms >= 10 ? 1 : 2)}ms`;
}
