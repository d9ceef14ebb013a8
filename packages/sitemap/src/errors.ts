import { SiteError } from "@apisite/theme-engine";

/** Thrown when a documentation model file is unreadable or malformed. */
export class ModelValidationError extends SiteError {
  readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[], options?: { cause?: unknown }) {
    super(message, options);
    this.errors = [...errors];
  }
}
