/**
 * Logback-style level configuration for hierarchical logger names.
 *
 * Rules come from a `.properties` file or are set at runtime:
 * - `root` (or `*`) sets the root level
 * - `app.db.orders` is an exact rule
 * - `app.db.*` is a wildcard rule, ranked by how many name segments precede the `*`
 *
 * Names are matched case-insensitively. A loaded file is rescanned from
 * {@link RuleStore.checkAndReloadIfNeeded}, which may be called on every log call;
 * it touches the file system at most once per scan period.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { ConfigFileNotFoundError, LoggingConfigError } from "./errors.ts";
import { LogLevel, parseLevel } from "./levels.ts";
import { parsePropertiesLine, parseScanPeriod, DEFAULT_SCAN_PERIOD_MS, splitLines } from "./properties.ts";

export interface LevelRule {
  pattern: string;
  level: LogLevel;
}

/** File access used by the store; replaceable so reload timing can be observed */
export interface ConfigFileSystem {
  exists(path: string): boolean;
  readText(path: string): string;
  /** Modification time in ms, or undefined when the file is gone */
  modifiedTime(path: string): number | undefined;
}

export const nodeFileSystem: ConfigFileSystem = {
  exists: (path) => existsSync(path),
  readText: (path) => readFileSync(path, "utf-8"),
  modifiedTime: (path) => statSync(path, { throwIfNoEntry: false })?.mtimeMs,
};

export interface RuleStoreOptions {
  /** Clock in ms. Default: Date.now */
  now?: () => number;
  fileSystem?: ConfigFileSystem;
}

/** Everything one parse of a properties text produces */
interface ParsedRules {
  rootLevel: LogLevel;
  exactRules: Map<string, LogLevel>;
  wildcardRules: LevelRule[];
  scanEnabled?: boolean;
  scanPeriod?: number;
}

const DEFAULT_ROOT_LEVEL = LogLevel.INFO;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function isRootKey(key: string): boolean {
  return key === "root" || key === "*";
}

/** Segments before the wildcard: `a.b.*` -> 2, `a.*` -> 1, `*` -> 0 */
export function getSpecificity(pattern: string): number {
  const segments = pattern.split(".").length;
  return pattern.includes("*") ? segments - 1 : segments;
}

export function matchesWildcard(name: string, pattern: string): boolean {
  if (!pattern.endsWith("*")) return name === pattern;
  const prefix = pattern.slice(0, -1);
  return prefix === "" || name.startsWith(prefix);
}

function sortBySpecificity(rules: LevelRule[]): void {
  // Array.prototype.sort is stable: equal specificity keeps declaration order
  rules.sort((a, b) => getSpecificity(b.pattern) - getSpecificity(a.pattern));
}

function putWildcard(rules: LevelRule[], pattern: string, level: LogLevel): void {
  const existing = rules.findIndex((r) => r.pattern === pattern);
  if (existing !== -1) rules.splice(existing, 1);
  rules.push({ pattern, level });
}

function parseRules(content: string): ParsedRules {
  const parsed: ParsedRules = {
    rootLevel: DEFAULT_ROOT_LEVEL,
    exactRules: new Map(),
    wildcardRules: [],
  };

  for (const line of splitLines(content)) {
    const entry = parsePropertiesLine(line);
    if (!entry) continue;

    const key = normalizeName(entry.key);
    if (key === "scan") {
      parsed.scanEnabled = entry.value.toLowerCase() === "true";
      continue;
    }
    if (key === "scan.period") {
      parsed.scanPeriod = parseScanPeriod(entry.value);
      continue;
    }

    const level = parseLevel(entry.value);
    if (isRootKey(key)) parsed.rootLevel = level;
    else if (key.includes("*")) putWildcard(parsed.wildcardRules, key, level);
    else parsed.exactRules.set(key, level);
  }

  sortBySpecificity(parsed.wildcardRules);
  return parsed;
}

export class RuleStore {
  private rootLevel = DEFAULT_ROOT_LEVEL;
  private exactRules = new Map<string, LogLevel>();
  private wildcardRules: LevelRule[] = [];

  private file = "";
  private fileModifiedTime = 0;
  private lastCheckTime = 0;
  private reloaded = false;
  private scan = false;
  private period = DEFAULT_SCAN_PERIOD_MS;
  private reloadError: Error | undefined;

  private readonly now: () => number;
  private readonly fs: ConfigFileSystem;

  constructor(options: RuleStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.fs = options.fileSystem ?? nodeFileSystem;
  }

  /** Path of the last file loaded, or "" */
  get configFile(): string {
    return this.file;
  }

  get scanEnabled(): boolean {
    return this.scan;
  }

  /** Scan period in ms */
  get scanPeriod(): number {
    return this.period;
  }

  /** Why the last automatic reload was rejected; cleared by the next successful one */
  get lastReloadError(): Error | undefined {
    return this.reloadError;
  }

  /**
   * Replace all rules with the ones in `content`.
   * Scan settings are kept unless the text sets them.
   */
  loadFromText(content: string): void {
    this.apply(parseRules(content));
  }

  /**
   * Load rules from a properties file and remember it for reloads.
   * @throws ConfigFileNotFoundError when the file does not exist
   */
  loadFromFile(path: string): void {
    if (!this.fs.exists(path)) throw new ConfigFileNotFoundError(path);

    const content = this.fs.readText(path);
    this.file = path;
    this.loadFromText(content);
    this.fileModifiedTime = this.fs.modifiedTime(path) ?? 0;
    this.lastCheckTime = this.now();
  }

  /**
   * Re-read the last loaded file.
   * @throws LoggingConfigError when no file was ever loaded
   */
  reload(): void {
    if (this.file === "") throw new LoggingConfigError("No configuration file loaded. Cannot reload.");
    this.loadFromFile(this.file);
  }

  clear(): void {
    this.exactRules = new Map();
    this.wildcardRules = [];
    this.rootLevel = DEFAULT_ROOT_LEVEL;
  }

  getRootLevel(): LogLevel {
    return this.rootLevel;
  }

  setRootLevel(level: LogLevel): void {
    this.rootLevel = level;
  }

  /** Copy of the current rules, most specific wildcard first */
  getRules(): { root: LogLevel; exact: LevelRule[]; wildcard: LevelRule[] } {
    return {
      root: this.rootLevel,
      exact: [...this.exactRules].map(([pattern, level]) => ({ pattern, level })),
      wildcard: this.wildcardRules.map((r) => ({ ...r })),
    };
  }

  /**
   * Resolve the effective level for a logger name:
   * exact rule, then the most specific matching wildcard, then the root level
   * if it was set to something other than INFO, then `defaultLevel`.
   *
   * Note that `root=INFO` is indistinguishable from an unset root and falls
   * through to `defaultLevel`.
   */
  getLevelForLogger(name: string, defaultLevel: LogLevel = LogLevel.INFO): LogLevel {
    const normalized = normalizeName(name);

    const exact = this.exactRules.get(normalized);
    if (exact !== undefined) return exact;

    for (const rule of this.wildcardRules) {
      if (matchesWildcard(normalized, rule.pattern)) return rule.level;
    }

    return this.rootLevel !== DEFAULT_ROOT_LEVEL ? this.rootLevel : defaultLevel;
  }

  /** Set a rule at runtime; `name` may be `root`, a wildcard pattern or an exact name */
  setLoggerLevel(name: string, level: LogLevel): void {
    const normalized = normalizeName(name);

    if (isRootKey(normalized)) {
      this.rootLevel = level;
    }
    else if (normalized.includes("*")) {
      putWildcard(this.wildcardRules, normalized, level);
      sortBySpecificity(this.wildcardRules);
    }
    else {
      this.exactRules.set(normalized, level);
    }
  }

  /**
   * Reload the config file if scanning is on, a scan period has passed since
   * the last check, and the file's modification time changed. Any failure
   * keeps the current rules and is recorded in {@link lastReloadError}.
   */
  checkAndReloadIfNeeded(): void {
    if (!this.scan || this.file === "") return;

    const now = this.now();
    if (now - this.lastCheckTime < this.period) return;

    // Stamped before the file is read: a failing reload also waits a full period
    this.lastCheckTime = now;

    try {
      const modified = this.fs.modifiedTime(this.file) ?? 0;
      if (modified === this.fileModifiedTime) return;

      const parsed = parseRules(this.fs.readText(this.file));
      this.apply(parsed);
      this.fileModifiedTime = modified;
      this.reloaded = true;
      this.reloadError = undefined;
    }
    catch (error) {
      this.reloadError = error instanceof Error ? error : new Error(String(error));
    }
  }

  /** True once after each automatic reload */
  wasConfigReloaded(): boolean {
    const result = this.reloaded;
    this.reloaded = false;
    return result;
  }

  private apply(parsed: ParsedRules): void {
    this.rootLevel = parsed.rootLevel;
    this.exactRules = parsed.exactRules;
    this.wildcardRules = parsed.wildcardRules;
    if (parsed.scanEnabled !== undefined) this.scan = parsed.scanEnabled;
    if (parsed.scanPeriod !== undefined) this.period = parsed.scanPeriod;
  }
}
