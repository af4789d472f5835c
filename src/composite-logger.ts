/**
 * Broadcasts each record to a set of member loggers.
 *
 * The composite is the single point of filtering: members are set to TRACE
 * when added, and `setLevel` on the composite only changes the composite.
 * A `LoggerFactory` does not re-level a logger while it is a member.
 *
 * ```typescript
 * const all = new CompositeLogger("app", LogLevel.DEBUG);
 * all.addLogger(new ConsoleLogger("app"));
 * all.addLogger(new FileLogger("app"));
 * ```
 */

import { BaseLogger, logAtLevel } from "./base-logger.ts";
import { internalError } from "./internal-logger.ts";
import { LogLevel } from "./levels.ts";
import type { BaseLoggerOptions, Logger } from "./types.ts";

// Number of composites each logger belongs to
const memberships = new WeakMap<Logger, number>();

function changeMembership(logger: Logger, delta: number): void {
  const count = (memberships.get(logger) ?? 0) + delta;
  if (count > 0) memberships.set(logger, count);
  else memberships.delete(logger);
}

/** True while `logger` belongs to a composite; its level then stays at TRACE */
export function isCompositeMember(logger: Logger): boolean {
  return memberships.has(logger);
}

export class CompositeLogger extends BaseLogger {
  private members: Logger[] = [];

  constructor(name: string = "", level: LogLevel = LogLevel.INFO, options: BaseLoggerOptions = {}) {
    super(name, level, options);
  }

  /** Add a member; the composite itself and a logger already present are ignored */
  addLogger(logger: Logger | undefined): void {
    if (!logger || logger === this || this.members.includes(logger)) return;
    logger.setLevel(LogLevel.TRACE);
    this.members.push(logger);
    changeMembership(logger, 1);
  }

  removeLogger(logger: Logger | undefined): boolean {
    if (!logger) return false;
    const index = this.members.indexOf(logger);
    if (index === -1) return false;
    this.members.splice(index, 1);
    changeMembership(logger, -1);
    return true;
  }

  clearLoggers(): void {
    for (const member of this.members) changeMembership(member, -1);
    this.members = [];
  }

  getLoggerCount(): number {
    return this.members.length;
  }

  protected emit(level: LogLevel, message: string): void {
    for (const member of [...this.members]) {
      try {
        logAtLevel(member, level, message);
      }
      catch (error) {
        internalError(`Composite "${this.name}" member "${member.name}" failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
