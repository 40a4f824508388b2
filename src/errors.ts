// TimeParseError is thrown when an expiry value is neither epoch seconds nor a date.
export class TimeParseError extends Error {
  readonly input: string;

  constructor(input: string | number) {
    super(`Unable to parse time: ${JSON.stringify(input)}`);
    this.name = 'TimeParseError';
    this.input = String(input);
  }
}

export function isTimeParseError(e: unknown): e is TimeParseError {
  return e instanceof TimeParseError;
}

// NoSuchAttributeError marks a lookup outside the fixed cookie attribute set.
export class NoSuchAttributeError extends Error {
  readonly attribute: string;

  constructor(attribute: string) {
    super(`No such cookie attribute: ${attribute}`);
    this.name = 'NoSuchAttributeError';
    this.attribute = attribute;
  }
}

export function isNoSuchAttributeError(e: unknown): e is NoSuchAttributeError {
  return e instanceof NoSuchAttributeError;
}

export class SetCookieParseError extends Error {
  readonly input: string;

  constructor(input: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid Set-Cookie string ${JSON.stringify(input)}: ${message}`, options);
    this.name = 'SetCookieParseError';
    this.input = input;
  }
}

export function isSetCookieParseError(e: unknown): e is SetCookieParseError {
  return e instanceof SetCookieParseError;
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
