export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
  }
}
export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class ParseError extends SyncError {
  constructor(
    message: string,
    readonly file: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "ParseError";
  }
}
export class NotFoundError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}
export class RemoteTagMissingError extends SyncError {
  constructor(readonly tag: string) {
    super(`Tag '${tag}' does not exist at the remote`);
    this.name = "RemoteTagMissingError";
  }
}
// status is absent when the request never got a response
export class ApiError extends SyncError {
  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "ApiError";
  }
}
export class RemoteCallError extends SyncError {
  constructor(
    message: string,
    readonly tag: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "RemoteCallError";
  }
}
