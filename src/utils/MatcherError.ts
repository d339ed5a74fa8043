/**
 * Error kinds that end a matching run.
 * - configuration: bad options or an account path that does not resolve
 * - session: the book cannot be opened, is locked, or cannot be saved
 */
export type MatcherErrorKind = 'configuration' | 'session';

/**
 * Fatal error raised by the run before or after matching.
 * Session messages are complete sentences for the user; configuration
 * messages get an "Error: " prefix when printed.
 * Data anomalies never surface as errors; they are skipped by the engine.
 */
export class MatcherError extends Error {
  public readonly kind: MatcherErrorKind;

  constructor(message: string, kind: MatcherErrorKind) {
    super(message);
    this.name = 'MatcherError';
    this.kind = kind;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, MatcherError.prototype);
  }

  static invalidOptions(message: string): MatcherError {
    return new MatcherError(message, 'configuration');
  }

  static accountNotFound(role: 'payment' | 'control', path: string): MatcherError {
    const label = role === 'payment' ? 'payment account' : 'A/R or A/P account';
    return new MatcherError(`Could not find ${label} '${path}'`, 'configuration');
  }

  static sessionOpen(path: string, reason: string): MatcherError {
    return new MatcherError(`Error opening GnuCash file '${path}': ${reason}`, 'session');
  }

  static sessionLocked(path: string, holder: string): MatcherError {
    return new MatcherError(
      `Error opening GnuCash file '${path}': locked by ${holder}; close it in GnuCash first`,
      'session'
    );
  }

  static sessionSave(reason: string): MatcherError {
    return new MatcherError(`Error saving GnuCash file: ${reason}`, 'session');
  }

  static sessionClosed(): MatcherError {
    return new MatcherError('Error saving GnuCash file: session has already ended', 'session');
  }
}

export default MatcherError;
