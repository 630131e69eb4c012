export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class StoreQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreQueryError';
  }
}

export class StoreUpdateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreUpdateError';
  }
}

export class SendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SendError';
  }
}

/** The post is over the platform limit even with a single vacancy in it. */
export class RenderOverflowError extends Error {
  constructor(
    message: string,
    readonly length: number,
    readonly limit: number
  ) {
    super(message);
    this.name = 'RenderOverflowError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
