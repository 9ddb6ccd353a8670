/**
 * Typed error catalog for storage operations.
 * Every failure a backend surfaces is one of these; none are retried here.
 */

export class StorageError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Caller-side preconditions

export class ConfigurationError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION", message, details);
  }
}

export class RequestConstructionError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("REQUEST_CONSTRUCTION", message, details);
  }
}

// Network

/** Wraps a failure from the HTTP layer; the message is the underlying one. */
export class TransportError extends StorageError {
  constructor(cause: unknown) {
    super(
      "TRANSPORT",
      cause instanceof Error ? cause.message : String(cause),
      undefined,
      { cause },
    );
  }
}

// Remote store status errors

export class RemoteWriteError extends StorageError {
  constructor(
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super(
      "REMOTE_WRITE",
      `Expected 200 OK, got: (${statusCode})\n${body}`,
      { statusCode },
    );
  }
}

/** The response body is never attached: it may be an arbitrarily large object. */
export class RemoteReadError extends StorageError {
  constructor(public readonly statusCode: number) {
    super("REMOTE_READ", `Unexpected status code: ${statusCode}`, {
      statusCode,
    });
  }
}

export class RemoteListError extends StorageError {
  constructor(
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super("REMOTE_LIST", `Unexpected status code: ${statusCode}\n${body}`, {
      statusCode,
    });
  }
}

export class ParseError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE", message, details);
  }
}

// Filesystem

export class NotFoundError extends StorageError {
  constructor(path: string) {
    super("NOT_FOUND", `Object not found: ${path}`, { path });
  }
}

export class InvalidPathError extends StorageError {
  constructor(path: string) {
    super("INVALID_PATH", `Object path escapes the storage root: ${path}`, {
      path,
    });
  }
}
