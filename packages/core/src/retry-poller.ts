/**
 * @summary Bounded polling for conditions that become true eventually.
 *
 * Used to wait for guest ssh reachability, for the SEV-SNP kernel log line
 * and for QEMU to exit after a guest shutdown. The poller sleeps only
 * between failed attempts and adds no side effects of its own.
 */

import { RetryTimeoutError, toError } from "./types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Options for polling behavior.
 */
export interface PollOptions {
  /**
   * Maximum number of predicate calls.
   * @default 30
   */
  maxAttempts?: number;

  /**
   * Sleep between failed attempts in milliseconds.
   * @default 1000
   */
  intervalMs?: number;

  /**
   * Callback invoked after each failed attempt.
   */
  onAttemptFailed?: (attempt: number, error?: Error) => void;
}

/**
 * Default polling options.
 */
export const DEFAULT_POLL_OPTIONS: Required<Omit<PollOptions, "onAttemptFailed">> = {
  maxAttempts: 30,
  intervalMs: 1000,
};

export type PollOutcome =
  | { status: "ok"; attempts: number }
  | { status: "timeout"; attempts: number; lastError?: Error };

/**
 * A condition to poll. Returning false or throwing is a failed attempt.
 */
export type Predicate = () => boolean | Promise<boolean>;

export type Sleep = (ms: number) => Promise<void>;

// ---------------------------------------------------------------------------
// Poller
// ---------------------------------------------------------------------------

export class RetryPoller {
  private readonly sleep: Sleep;

  constructor(sleep?: Sleep) {
    this.sleep = sleep ?? defaultSleep;
  }

  /**
   * Call `predicate` until it succeeds or the attempt budget runs out.
   */
  async waitUntil(predicate: Predicate, options: PollOptions = {}): Promise<PollOutcome> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_POLL_OPTIONS.maxAttempts;
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_OPTIONS.intervalMs;

    let lastError: Error | undefined;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let ok = false;
      try {
        ok = await predicate();
        if (!ok) {
          lastError = undefined;
        }
      } catch (err) {
        lastError = toError(err);
      }

      if (ok) {
        return { status: "ok", attempts: attempt };
      }

      options.onAttemptFailed?.(attempt, lastError);
      if (attempt < maxAttempts) {
        await this.sleep(intervalMs);
      }
    }

    return lastError === undefined
      ? { status: "timeout", attempts: maxAttempts }
      : { status: "timeout", attempts: maxAttempts, lastError };
  }

  /**
   * Like `waitUntil`, but a timeout throws `RetryTimeoutError` carrying the
   * last predicate error as its cause.
   */
  async retryUntil(
    operation: string,
    predicate: Predicate,
    options: PollOptions = {}
  ): Promise<number> {
    const outcome = await this.waitUntil(predicate, options);
    if (outcome.status === "timeout") {
      throw new RetryTimeoutError(operation, outcome.attempts, outcome.lastError);
    }
    return outcome.attempts;
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
