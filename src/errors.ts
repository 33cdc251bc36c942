/**
 * Error types raised by the toolkit.
 *
 * Construction errors (bad placement, tiny terminal, invalid slider value,
 * duplicate form keys) propagate to the caller. Drawing errors are caught by
 * the controller's render pass and turned into an on-screen banner.
 */

export class GridTuiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A widget was placed outside of its grid. */
export class OutOfBoundsError extends GridTuiError {}

/** The terminal cannot fit the requested grid (`3*rows >= height` or `3*cols >= width`). */
export class TerminalTooSmallError extends OutOfBoundsError {}

export class MissingParentError extends GridTuiError {}

/** Drawing was attempted without a renderer or backend. */
export class RendererError extends GridTuiError {}

export class InvalidValueError extends GridTuiError {}

export class DuplicateFormKeyError extends GridTuiError {}

/** A backend write started outside the terminal. */
export class DrawOutOfBoundsError extends GridTuiError {}

export class ConfigError extends GridTuiError {}
