import type { BucketRegistry } from './bucket-registry';

/**
 * Authoritative bucket state, parsed from a single call-limit observation
 */
export interface BucketState {
  readonly capacity: number;
  readonly currentFillLevel: number;
}

/**
 * Outcome of one transport attempt.
 * `rate-limited` is the only kind the policy retries.
 */
export type TransportOutcome<T> =
  | { kind: 'success'; result: T; response: { headers: Headers } }
  | { kind: 'rate-limited' }
  | { kind: 'failure'; error: unknown };

/**
 * Executes a single attempt with an independent request object
 */
export type ExecuteRequest<T> = (
  request: Request,
  signal?: AbortSignal
) => Promise<TransportOutcome<T>>;

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Wraps one logical request execution
 */
export interface ExecutionPolicy {
  run<T>(template: Request, execute: ExecuteRequest<T>, options?: RunOptions): Promise<T>;
}

export type Clock = () => number;

export type PolicyLogger = Pick<Console, 'debug' | 'warn'>;

export interface BaseSmartRetryConfig {
  // Reactive retry configuration
  throttleDelayMs?: number; // Default: 500

  logger?: PolicyLogger;
}

/**
 * The policy creates its own registry from these bucket settings
 */
export interface OwnedRegistryConfig extends BaseSmartRetryConfig {
  // Leaky bucket configuration
  drainIntervalMs?: number; // Default: 500 (one unit drained per interval)
  defaultCapacity?: number; // Default: 40, replaced by the first observation

  // Monotonic clock in milliseconds. Default: performance.now
  now?: Clock;

  registry?: undefined;
}

/**
 * Buckets shared with other policies; the registry carries its own bucket settings
 */
export interface SharedRegistryConfig extends BaseSmartRetryConfig {
  registry: BucketRegistry;

  drainIntervalMs?: never;
  defaultCapacity?: never;
  now?: never;
}

/**
 * Configuration for SmartRetryExecutionPolicy
 */
export type SmartRetryConfig = OwnedRegistryConfig | SharedRegistryConfig;

/**
 * Settings after config, environment and defaults have been merged
 */
export interface ResolvedSmartRetrySettings {
  drainIntervalMs: number;
  defaultCapacity: number;
  throttleDelayMs: number;
}

/**
 * Event types emitted by SmartRetryExecutionPolicy
 */
export interface PolicyEvents {
  'granted': (runId: string, attempt: number) => void;
  'state-updated': (runId: string, state: BucketState) => void;
  'rate-limited': (runId: string, attempt: number, delayMs: number) => void;
}
