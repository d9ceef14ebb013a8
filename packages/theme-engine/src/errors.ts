/**
 * Theme Errors
 *
 * Every failure of theme resolution is an authoring error: none of these are
 * retried and all of them abort the run.
 */

/** Base class for documentation site errors. */
export abstract class SiteError extends Error {
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
  }
}

/** Thrown when a theme directory or its declaration file does not exist. */
export class ThemeNotFoundError extends SiteError {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
  }
}

/** Thrown when a theme declaration is malformed. Lists every violation found. */
export class ThemeValidationError extends SiteError {
  readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[], options?: { cause?: unknown }) {
    super(message, options);
    this.errors = [...errors];
  }
}

/** Thrown when a theme appears more than once in its own base chain. */
export class CircularThemeError extends SiteError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`Theme inheritance is circular: ${chain.join(" -> ")}`);
    this.chain = [...chain];
  }
}

/** Thrown when a value does not match the declared type of a theme parameter. */
export class ParameterFormatError extends SiteError {
  constructor(
    message: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(message);
  }
}
