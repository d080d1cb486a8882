/**
 * @summary Progress reporting seam.
 *
 * Components report what they are doing through a `Reporter` and never call
 * `console` themselves. The CLI supplies a colored console implementation;
 * tests use `RecordingReporter`.
 */

export type ReportLevel =
  | "info"
  | "step"
  | "skip"
  | "success"
  | "warn"
  | "error"
  | "debug";

export interface Reporter {
  info(message: string): void;
  /** A step is starting */
  step(message: string): void;
  /** A step was skipped because it already completed */
  skip(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only shown in debug mode */
  debug(message: string): void;
}

export interface ReportEntry {
  level: ReportLevel;
  message: string;
}

/**
 * Reporter that keeps every line in memory.
 */
export class RecordingReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  step(message: string): void {
    this.entries.push({ level: "step", message });
  }

  skip(message: string): void {
    this.entries.push({ level: "skip", message });
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  messages(level?: ReportLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}

/**
 * Prefix every message with a bracketed component tag.
 */
export function prefixedReporter(reporter: Reporter, prefix: string): Reporter {
  const tag = (message: string) => `[${prefix}] ${message}`;
  return {
    info: (message) => reporter.info(tag(message)),
    step: (message) => reporter.step(tag(message)),
    skip: (message) => reporter.skip(tag(message)),
    success: (message) => reporter.success(tag(message)),
    warn: (message) => reporter.warn(tag(message)),
    error: (message) => reporter.error(tag(message)),
    debug: (message) => reporter.debug(tag(message)),
  };
}
