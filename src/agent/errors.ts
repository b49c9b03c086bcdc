/** A turn failed even after the degraded retry, or ran out of iterations. */
export class TurnError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TurnError';
  }
}
