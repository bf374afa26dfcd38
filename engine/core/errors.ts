/**
 * Sheetgrid Engine - Errors
 *
 * Strict invariants (coordinates, ranges, merges, store options) throw
 * InvalidArgumentError. Use of a disposed store throws IllegalStateError.
 * Rendering and value auto-detection never throw.
 */

export class SheetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends SheetError {}

/** Malformed A1-style notation */
export class NotationError extends InvalidArgumentError {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
  }
}

export class IllegalStateError extends SheetError {}
