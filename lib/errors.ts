/**
 * Error carrying the HTTP status it should be answered with.
 * The message is sent to the client as `{ "error": message }`.
 */
export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

export class AuthError extends HttpError {
  constructor(message: string) {
    super(401, message);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor() {
    super(405, 'Method not allowed');
    this.name = 'MethodNotAllowedError';
  }
}

/**
 * The backing file exists but does not hold a JSON array of users.
 * Never recovered from by treating the store as empty: the next save would
 * overwrite whatever is still in the file.
 */
export class StoreCorruptError extends HttpError {
  public readonly filePath: string;
  public readonly detail: string;

  constructor(filePath: string, detail: string) {
    super(500, 'User store is corrupt');
    this.name = 'StoreCorruptError';
    this.filePath = filePath;
    this.detail = detail;
  }
}

/** Startup configuration is missing or malformed. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
