/**
 * Error raised when the VMC API answers with a non-2xx status.
 */
export class VmcApiError extends Error {
  public readonly status: number;
  public readonly body: string;
  public readonly path: string;

  constructor(status: number, body: string, path: string) {
    super(`VMC API error: ${status} ${path}${body ? ` ${body}` : ''}`);
    this.name = 'VmcApiError';
    this.status = status;
    this.body = body;
    this.path = path;
  }

  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

export class AuthenticationError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

export class NotConnectedError extends Error {
  constructor() {
    super('Not connected: call connect() with a refresh token and org id first');
    this.name = 'NotConnectedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Bad command line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
