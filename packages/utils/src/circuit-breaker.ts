import { type Result, ok, err, toError } from './result.js';
import { withTimeout } from './timeout.js';
import { createLogger } from './logger.js';

const logger = createLogger({ service: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  // Consecutive failures that open the circuit
  failureThreshold: number;
  // Deadline for each guarded call
  timeoutMs: number;
  // How long an open circuit refuses calls before letting a trial through
  resetTimeoutMs: number;
  now?: () => number;
}

export class CircuitOpenError extends Error {
  constructor(
    readonly circuit: string,
    readonly retryInMs: number
  ) {
    super(`Circuit '${circuit}' is open`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Fails fast while a provider keeps failing. After `failureThreshold`
 * consecutive failures the circuit opens. Once `resetTimeoutMs` has passed,
 * one trial call goes through: success closes the circuit, failure reopens it.
 * Other calls made while the trial is running are refused.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openedAt = 0;
  private trialRunning = false;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions
  ) {
    this.now = options.now ?? (() => Date.now());
  }

  async execute<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
    const refused = this.admit();
    if (refused) {
      return err(refused);
    }

    const trial = this.state === 'half-open';
    try {
      const value = await withTimeout(fn, this.options.timeoutMs, `${this.name} call`);
      this.recordSuccess();
      return ok(value);
    } catch (error) {
      this.recordFailure();
      return err(toError(error));
    } finally {
      if (trial) {
        this.trialRunning = false;
      }
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private admit(): CircuitOpenError | null {
    if (this.state === 'closed') {
      return null;
    }
    if (this.state === 'open') {
      const waited = this.now() - this.openedAt;
      if (waited < this.options.resetTimeoutMs) {
        return new CircuitOpenError(this.name, this.options.resetTimeoutMs - waited);
      }
      this.transitionTo('half-open');
    }
    if (this.trialRunning) {
      return new CircuitOpenError(this.name, 0);
    }
    this.trialRunning = true;
    return null;
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state === 'half-open') {
      this.transitionTo('closed');
    }
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (
      this.state === 'half-open' ||
      (this.state === 'closed' && this.consecutiveFailures >= this.options.failureThreshold)
    ) {
      this.openedAt = this.now();
      this.transitionTo('open');
    }
  }

  private transitionTo(next: CircuitState): void {
    logger.info(
      { circuit: this.name, from: this.state, to: next, consecutiveFailures: this.consecutiveFailures },
      'Circuit state change'
    );
    this.state = next;
  }
}

export const isCircuitOpenError = (error: unknown): error is CircuitOpenError =>
  error instanceof CircuitOpenError;

export function createCircuitBreaker(
  name: string,
  options: Partial<CircuitBreakerOptions> = {}
): CircuitBreaker {
  return new CircuitBreaker(name, {
    failureThreshold: 5,
    timeoutMs: 30000,
    resetTimeoutMs: 60000,
    ...options,
  });
}

// One breaker per external provider
export const circuitBreakerPresets = {
  groq: {
    failureThreshold: 5,
    timeoutMs: 60000,
    resetTimeoutMs: 60000,
  },
  openai: {
    failureThreshold: 5,
    timeoutMs: 30000,
    resetTimeoutMs: 30000,
  },
  outlook: {
    failureThreshold: 3,
    timeoutMs: 30000,
    resetTimeoutMs: 30000,
  },
} as const satisfies Record<string, CircuitBreakerOptions>;
