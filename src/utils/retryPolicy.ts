import type { Logger } from "pino";
import { sleep as defaultSleep, type Sleep } from "../platform/clock/wallClock";

const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);

export interface RetryOptions {
  maxAttempts?: number;
  /** Delay for attempt n is multiplierMs * 2^(n-1), clamped to [minDelayMs, maxDelayMs]. */
  multiplierMs?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  retryCondition?: (error: unknown, attempt: number) => boolean;
  sleep?: Sleep;
}

/**
 * Exponential backoff around a single async operation. The last failure is
 * re-thrown unchanged once attempts run out or the condition rejects it.
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly multiplierMs: number;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly retryCondition: (error: unknown, attempt: number) => boolean;
  private readonly sleep: Sleep;

  constructor(
    private readonly logger: Logger,
    options: RetryOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.multiplierMs = options.multiplierMs ?? 1000;
    this.minDelayMs = options.minDelayMs ?? 0;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.retryCondition = options.retryCondition ?? (() => true);
    this.sleep = options.sleep ?? defaultSleep;
  }

  calculateDelay(attempt: number): number {
    const delay = this.multiplierMs * Math.pow(2, attempt - 1);
    return Math.min(Math.max(delay, this.minDelayMs), this.maxDelayMs);
  }

  async execute<T>(fn: () => Promise<T>, context: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.retryCondition(error, attempt)) {
          throw error;
        }
        const delayMs = this.calculateDelay(attempt);
        this.logger.warn(
          { context, attempt, delayMs, error: describeError(error) },
          "Operation failed, retrying",
        );
        await this.sleep(delayMs);
      }
    }
  }
}

/**
 * One (predicate, wait) pair. `matches` decides whether the rule applies to
 * an error at all; `maxAttempts` bounds how many attempts it will retry.
 */
export interface RetryRule {
  name: string;
  matches(error: unknown): boolean;
  /** Retry while the failed attempt number is <= this. Unbounded when omitted. */
  maxAttempts?: number;
  waitSeconds(error: unknown, attempt: number): number;
}

export interface CompositeRetryOptions {
  rules: RetryRule[];
  /** Hard stop across every rule, counted in total attempts. */
  stopAfterAttempt?: number;
  sleep?: Sleep;
}

/**
 * Combines retry rules in order: retry if any rule says so, wait the sum of
 * every matching rule's wait.
 */
export class CompositeRetryPolicy {
  private readonly rules: RetryRule[];
  private readonly stopAfterAttempt?: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly logger: Logger,
    options: CompositeRetryOptions,
  ) {
    this.rules = options.rules;
    this.stopAfterAttempt = options.stopAfterAttempt;
    this.sleep = options.sleep ?? defaultSleep;
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return this.rules.some(
      (rule) => rule.matches(error) && (rule.maxAttempts === undefined || attempt <= rule.maxAttempts),
    );
  }

  waitSeconds(error: unknown, attempt: number): number {
    return this.rules.reduce(
      (total, rule) => (rule.matches(error) ? total + rule.waitSeconds(error, attempt) : total),
      0,
    );
  }

  async execute<T>(fn: () => Promise<T>, context: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) {
          throw error;
        }
        if (this.stopAfterAttempt !== undefined && attempt >= this.stopAfterAttempt) {
          this.logger.warn(
            { context, attempt, stopAfterAttempt: this.stopAfterAttempt },
            "Retry attempts exhausted",
          );
          throw error;
        }
        const waitSeconds = this.waitSeconds(error, attempt);
        this.logger.warn(
          { context, attempt, waitSeconds, error: describeError(error) },
          "Request failed, retrying",
        );
        await this.sleep(waitSeconds * 1000);
      }
    }
  }
}
