// Raised by a rate source when its upstream cannot supply a usable payload.
export class RateSourceError extends Error {
  constructor(
    readonly source: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${source}: ${message}`, { cause });
    this.name = 'RateSourceError';
  }
}
