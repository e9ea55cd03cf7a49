export class AnalysisTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'AnalysisTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, AnalysisTimeoutError.prototype);
  }
}
