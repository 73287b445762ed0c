export class PositionTimeoutError extends Error {
  constructor(readonly timeLimitMs: number) {
    super(`Position not available within ${timeLimitMs}ms`);
    this.name = 'PositionTimeoutError';
  }
}

export class LocationUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LocationUnavailableError';
  }
}
