export class TimeoutError extends Error {
  constructor(
    public readonly agent: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agent} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CompletionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error
  ) {
    super(`Agent ${agent} completion failed: ${originalError.message}`);
    this.name = 'CompletionError';
    this.cause = originalError;
  }
}

export class CompletionParseError extends Error {
  constructor(
    public readonly agent: string,
    public readonly preview: string,
    reason: string
  ) {
    super(`Agent ${agent} returned unparseable JSON: ${reason}`);
    this.name = 'CompletionParseError';
  }
}
