/**
 * @summary Colored console output for the snpctl command.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { Reporter } from "@snpctl/core";

/** Receives one line of output, without its newline */
export type LineWriter = (line: string) => void;

export interface ConsoleReporterOptions {
  /** Print `debug` lines */
  debug: boolean;
  stdout?: LineWriter;
  stderr?: LineWriter;
  /** Defaults to chalk's detected color level */
  chalk?: ChalkInstance;
}

export class ConsoleReporter implements Reporter {
  private readonly debugEnabled: boolean;
  private readonly stdout: LineWriter;
  private readonly stderr: LineWriter;
  private readonly color: ChalkInstance;

  constructor(options: ConsoleReporterOptions) {
    this.debugEnabled = options.debug;
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
    this.color = options.chalk ?? chalk;
  }

  info(message: string): void {
    this.stdout(message);
  }

  step(message: string): void {
    this.stdout(this.color.blue(message));
  }

  skip(message: string): void {
    this.stdout(this.color.gray(message));
  }

  success(message: string): void {
    this.stdout(this.color.green(message));
  }

  warn(message: string): void {
    this.stderr(this.color.yellow(message));
  }

  error(message: string): void {
    this.stderr(this.color.red(message));
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      this.stdout(this.color.gray(message));
    }
  }
}
