/**
 * Retry and circuit-breaker helpers shared by the outbound HTTP clients
 * (Telegram Bot API, Gemini).
 */

export interface RetryPolicy {
  maxAttempts: number;
  /** Milliseconds to wait after failed attempt `attempt` (1-based). */
  backoff: (attempt: number, error: unknown) => number;
  /** Errors this rejects are rethrown at once. Retries everything if unset. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/** `baseMs`, `2 * baseMs`, `4 * baseMs`, ... capped at `capMs`. */
export function exponentialBackoff(baseMs: number, capMs: number) {
  return (attempt: number): number =>
    Math.min(baseMs * 2 ** (attempt - 1), capMs);
}

/**
 * Runs `fn` until it resolves, the policy rejects the error, or
 * `maxAttempts` is used up. The error of the last attempt propagates.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable =
        attempt < policy.maxAttempts && (policy.shouldRetry?.(error) ?? true);
      if (!retryable) throw error;

      const delayMs = policy.backoff(attempt, error);
      policy.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Fails fast after `threshold` consecutive failures. Once `cooldownMs` has
 * passed, a single trial call goes through: success closes the circuit,
 * failure keeps it open for another cooldown.
 */
export class CircuitBreaker {
  private failures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(
    private readonly name: string,
    private readonly threshold: number,
    private readonly cooldownMs: number,
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    let trial = false;
    if (this.openedAt !== null) {
      const remaining = this.openedAt + this.cooldownMs - Date.now();
      if (remaining > 0 || this.trialInFlight) {
        throw new CircuitOpenError(this.name, Math.max(remaining, 0));
      }
      trial = true;
      this.trialInFlight = true;
    }

    try {
      const result = await fn();
      this.failures = 0;
      this.openedAt = null;
      return result;
    } catch (error) {
      this.failures++;
      if (trial || this.failures >= this.threshold) {
        this.openedAt = Date.now();
      }
      throw error;
    } finally {
      if (trial) this.trialInFlight = false;
    }
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs: number,
  ) {
    super(`Circuit '${circuitName}' is open, retry in ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
