export class TransportError extends Error {
  readonly status: number | null;

  readonly url: string;

  constructor(message: string, url: string, status: number | null = null) {
    super(message);
    this.name = "TransportError";
    this.url = url;
    this.status = status;
  }
}

export class MissingFieldError extends Error {
  readonly field: string;

  constructor(field: string) {
    super(`missing field \`${field}\``);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

export class DeserializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeserializationError";
  }
}

export class NotFoundError extends Error {
  readonly query: string;

  constructor(query: string) {
    super(`${query} is not a valid team`);
    this.name = "NotFoundError";
    this.query = query;
  }
}

export class FileError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Could not access ${path}: ${reason}`);
    this.name = "FileError";
    this.path = path;
  }
}

export class ColorParseError extends Error {
  constructor(value: string) {
    super(`Invalid color value ${value}`);
    this.name = "ColorParseError";
  }
}

export function isParseError(error: unknown): error is MissingFieldError | DeserializationError {
  return error instanceof MissingFieldError || error instanceof DeserializationError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
