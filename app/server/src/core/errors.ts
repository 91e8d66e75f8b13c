export type ErrorKind =
  | 'validation'
  | 'format'
  | 'not_found'
  | 'unreachable'
  | 'timeout'
  | 'storage';

const STATUS: Record<ErrorKind, number> = {
  validation: 400,
  format: 422,
  not_found: 503,
  unreachable: 502,
  timeout: 504,
  storage: 500,
};

/**
 * Base for every failure the core reports to its caller. None of them are
 * fatal: the API turns them into a JSON body and the user re-prompts.
 */
export class HostLaunchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }

  get httpStatus(): number {
    return STATUS[this.kind];
  }
}

/** A required field is missing or empty. */
export class ValidationError extends HostLaunchError {
  constructor(message: string) {
    super('validation', message);
  }
}

/** Malformed hostname text or an unparseable stored integer. */
export class FormatError extends HostLaunchError {
  constructor(message: string) {
    super('format', message);
  }
}

/** A required external binary is absent. */
export class NotFoundError extends HostLaunchError {
  readonly executable: string;

  constructor(executable: string) {
    super('not_found', `${executable} not found on the system.`);
    this.executable = executable;
  }
}

export class UnreachableError extends HostLaunchError {
  constructor(message: string) {
    super('unreachable', message);
  }
}

export class TimeoutError extends HostLaunchError {
  constructor(message: string) {
    super('timeout', message);
  }
}

/** Writing the properties file failed; wraps the OS error. */
export class StorageError extends HostLaunchError {
  constructor(message: string, cause: unknown) {
    super('storage', message, { cause });
  }
}
