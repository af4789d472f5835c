/**
 * printf-style message formatting used by every logger.
 *
 * Arguments that are functions are evaluated only when the message is
 * rendered, so callers can defer expensive work:
 *
 * ```typescript
 * logger.debug("state: %j", () => snapshot());
 * ```
 */

import sprintfJs from "sprintf-js";
import { internalError, internalWarn } from "./internal-logger.ts";

const { sprintf } = sprintfJs;

const LAZY_ARGUMENT_FAILED = "[error evaluating lazy argument]";

function resolveLazyArgs(args: readonly unknown[]): unknown[] {
  return args.map((arg) => {
    if (typeof arg !== "function") return arg;
    try {
      return arg();
    }
    catch (error) {
      internalError(`Error evaluating lazy argument: ${error instanceof Error ? error.message : String(error)}`);
      return LAZY_ARGUMENT_FAILED;
    }
  });
}

/**
 * Format `message` with `args`. With no args the message is returned verbatim
 * (`%%` included). A format string sprintf rejects is reported and rendered
 * raw, followed by the arguments.
 */
export function formatMessage(message: string, args: readonly unknown[]): string {
  if (args.length === 0) return message;

  const resolved = resolveLazyArgs(args);
  try {
    return sprintf(message, ...resolved);
  }
  catch (error) {
    internalWarn(`sprintf failed: ${error instanceof Error ? error.message : String(error)}; falling back to raw output`);
    return [message, ...resolved.map((arg) => String(arg))].join(" ");
  }
}

/** Format an error for logging */
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
  return `Non-Error exception: ${String(error)}`;
}

/**
 * Append an error to a message:
 * `<message> - Exception: <name>: <message>` plus the stack when requested.
 */
export function appendError(message: string, error: Error, includeStackTrace: boolean): string {
  const text = `${message} - Exception: ${error.name}: ${error.message}`;
  if (!includeStackTrace || !error.stack) return text;
  return `${text}\nStack Trace:\n${error.stack}`;
}

/**
 * Render the arguments of a leveled call, either `(message, ...args)` or
 * `(error, message, ...args)`.
 */
export function renderCall(first: string | Error, rest: readonly unknown[], includeStackTrace: boolean): string {
  if (typeof first === "string") return formatMessage(first, rest);

  const [message, ...args] = rest;
  const text = formatMessage(typeof message === "string" ? message : String(message ?? ""), args);
  return appendError(text, first, includeStackTrace);
}

/**
 * Create a lazy error formatter. Returns a function that formats the error only when called.
 * Use with the logger's lazy evaluation feature to avoid formatting errors when the level is disabled.
 *
 * @example
 * ```typescript
 * logger.debug("caught error: %s", lazyError(err));
 * logger.debug("with context: %s - %s", "operation failed", lazyError(err));
 * ```
 */
export function lazyError(error: unknown): () => string {
  return () => formatError(error);
}
