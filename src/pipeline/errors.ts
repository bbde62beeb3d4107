export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class DownloadError extends Error {
  constructor(
    public readonly url: string,
    reason: string
  ) {
    super(`Download of ${url} failed: ${reason}`);
    this.name = 'DownloadError';
  }
}
