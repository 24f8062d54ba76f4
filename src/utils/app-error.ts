/**
 * Base class for domain failures. `name` follows the concrete subclass so logs
 * and audit lines carry e.g. `ExpiredKeyError` instead of a generic `Error`.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}
