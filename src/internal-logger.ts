/**
 * Internal logging for the facade itself: bad format strings, throwing sinks,
 * refused chain links.
 * This module avoids circular dependencies by using a setter pattern.
 */

export type InternalLogFn = (message: string) => void;

const fallbackError: InternalLogFn = (message: string) => {
  console.error(`[logfacade] ${message}`);
};

const fallbackWarn: InternalLogFn = (message: string) => {
  console.warn(`[logfacade] ${message}`);
};

let errorFn: InternalLogFn = fallbackError;
let warnFn: InternalLogFn = fallbackWarn;

// Set while a report is being delivered, so a report raised by the
// reporting logger itself goes to the console instead of recursing.
let reporting = false;

function report(fn: InternalLogFn, fallback: InternalLogFn, message: string): void {
  if (reporting) {
    fallback(message);
    return;
  }
  reporting = true;
  try {
    fn(message);
  }
  finally {
    reporting = false;
  }
}

/**
 * Set the internal error function. Called by logger.ts after initialization.
 * Returns the previous function; pass undefined to restore the console fallback.
 */
export function setInternalErrorFn(fn: InternalLogFn | undefined): InternalLogFn {
  const previous = errorFn;
  errorFn = fn ?? fallbackError;
  return previous;
}

/**
 * Set the internal warning function. Called by logger.ts after initialization.
 * Returns the previous function; pass undefined to restore the console fallback.
 */
export function setInternalWarnFn(fn: InternalLogFn | undefined): InternalLogFn {
  const previous = warnFn;
  warnFn = fn ?? fallbackWarn;
  return previous;
}

/**
 * Log an internal library error (a sink that threw, a lazy argument that failed).
 */
export function internalError(message: string): void {
  report(errorFn, fallbackError, message);
}

/**
 * Log an internal library warning.
 */
export function internalWarn(message: string): void {
  report(warnFn, fallbackWarn, message);
}
