/**
 * Error types for the stream framework.
 *
 * Usage errors are fatal to the call that raised them, never to the process:
 * the stream stays usable after a rejected pushback.
 */

export class StreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StreamUsageError extends StreamError {
  constructor(message: string) {
    super(message);
    this.name = 'StreamUsageError';
  }
}

export class PushbackError extends StreamUsageError {
  constructor(stream: string, reason: string) {
    super(`Cannot push back on ${stream}: ${reason}`);
    this.name = 'PushbackError';
  }
}

export class RewindError extends StreamUsageError {
  constructor(source: string) {
    super(`${source} can't be rewound: it has been closed`);
    this.name = 'RewindError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}
