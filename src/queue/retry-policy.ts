import {
  BadRequestError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
} from "../providers/errors.js";

export type ErrorClass = new (...args: never[]) => Error;

export interface RetryRule {
  readonly match: ErrorClass;
  /** Total attempts, the first run included. */
  readonly attempts: number;
  readonly backoff: "fixed" | "exponential";
  readonly baseDelayMs: number;
  /** Multiplier per attempt for exponential backoff. */
  readonly factor?: number;
  readonly maxDelayMs?: number;
}

export interface RetryPolicy {
  readonly name: string;
  readonly rules: readonly RetryRule[];
}

const DEFAULT_FACTOR = 2;
const DEFAULT_MAX_DELAY_MS = 10 * 60_000;

export const NO_RETRY: RetryPolicy = { name: "none", rules: [] };

export const PROVIDER_RETRY_POLICY: RetryPolicy = {
  name: "provider",
  rules: [
    { match: ModelNotFoundError, attempts: 2, backoff: "fixed", baseDelayMs: 5_000 },
    { match: BadRequestError, attempts: 3, backoff: "exponential", baseDelayMs: 5_000, factor: 5 },
    { match: ServerError, attempts: 3, backoff: "exponential", baseDelayMs: 5_000 },
    { match: RateLimitError, attempts: 5, backoff: "exponential", baseDelayMs: 10_000 },
    { match: NetworkError, attempts: 3, backoff: "exponential", baseDelayMs: 2_000 },
  ],
};

export function findRule(policy: RetryPolicy, err: unknown): RetryRule | null {
  return policy.rules.find((rule) => err instanceof rule.match) ?? null;
}

/**
 * Delay before the next attempt after `attempt` (1-based) failed. Exponential
 * delays are jittered into the upper half of their window.
 */
export function backoffDelay(
  rule: RetryRule,
  attempt: number,
  random: () => number = Math.random,
): number {
  if (rule.backoff === "fixed") return rule.baseDelayMs;
  const exponential = rule.baseDelayMs * (rule.factor ?? DEFAULT_FACTOR) ** (attempt - 1);
  const capped = Math.min(exponential, rule.maxDelayMs ?? DEFAULT_MAX_DELAY_MS);
  return Math.round(capped * (0.5 + random() * 0.5));
}
