import { EventEmitter } from 'events';
import { BucketRegistry } from './bucket-registry';
import { getAccessToken, getBucketState } from './call-limit';
import { LeakyBucket } from './leaky-bucket';
import { abortable, isRateLimitError, resolveSmartRetrySettings, sleep } from './retry';
import {
  ExecuteRequest,
  ExecutionPolicy,
  PolicyEvents,
  PolicyLogger,
  ResolvedSmartRetrySettings,
  RunOptions,
  SmartRetryConfig,
  TransportOutcome,
} from './types';
import { generateUUID } from './utils';

/**
 * SmartRetryExecutionPolicy - proactively keeps requests under the remote
 * call limit with one leaky bucket per access token.
 *
 * If 100 requests for one token start at once against a capacity of 40,
 * 40 go out immediately and the other 60 are released at one per 500ms,
 * instead of 60 being rejected and retried in waves.
 *
 * Rejections can still happen (other processes sharing the token, latency,
 * a server-side algorithm that differs from ours); those are retried after
 * a fixed delay until the server accepts the request.
 */
export class SmartRetryExecutionPolicy extends EventEmitter implements ExecutionPolicy {
  private readonly settings: ResolvedSmartRetrySettings;
  private readonly registry: BucketRegistry;
  private readonly logger: PolicyLogger;

  constructor(config: SmartRetryConfig = {}) {
    super();

    this.settings = resolveSmartRetrySettings(config);
    this.registry =
      config.registry ??
      new BucketRegistry({
        capacity: this.settings.defaultCapacity,
        drainIntervalMs: this.settings.drainIntervalMs,
        now: config.now,
      });
    this.logger = config.logger ?? console;
  }

  /**
   * Execute `execute` with a fresh clone of `template` until it succeeds or
   * fails with something other than a rate-limit rejection
   */
  async run<T>(template: Request, execute: ExecuteRequest<T>, options: RunOptions = {}): Promise<T> {
    const { signal } = options;
    const runId = generateUUID();
    const accessToken = getAccessToken(template);
    const bucket = accessToken !== undefined ? this.registry.getOrCreate(accessToken) : undefined;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      const request = template.clone();

      if (bucket) {
        await bucket.grant(signal);
        this.notify('granted', runId, attempt);
      }

      const outcome = await this.attempt(execute, request, signal);

      if (outcome.kind === 'success') {
        this.reconcile(runId, bucket, outcome.response.headers);
        return outcome.result;
      }

      if (outcome.kind === 'failure') {
        throw outcome.error;
      }

      const delayMs = this.settings.throttleDelayMs;
      this.logger.warn(
        `Request ${runId} was rate limited on attempt ${attempt}, retrying in ${delayMs}ms`
      );
      this.notify('rate-limited', runId, attempt, delayMs);
      await sleep(delayMs, signal);
    }
  }

  /**
   * Run one attempt, folding a thrown rate-limit error into a `rate-limited` outcome.
   * An abort settles the attempt with the abort reason even if the executor ignores the signal.
   */
  private async attempt<T>(
    execute: ExecuteRequest<T>,
    request: Request,
    signal?: AbortSignal
  ): Promise<TransportOutcome<T>> {
    try {
      const outcome = await abortable(execute(request, signal), signal);
      signal?.throwIfAborted();
      return outcome;
    } catch (error) {
      signal?.throwIfAborted();
      if (!isRateLimitError(error)) {
        throw error;
      }
      return { kind: 'rate-limited' };
    }
  }

  private reconcile(runId: string, bucket: LeakyBucket | undefined, headers: Headers): void {
    if (!bucket) {
      return;
    }

    const state = getBucketState(headers);
    if (!state) {
      this.logger.debug(`Request ${runId} returned no usable call-limit header`);
      return;
    }

    bucket.setState(state);
    this.notify('state-updated', runId, state);
  }

  private notify<E extends keyof PolicyEvents>(event: E, ...args: Parameters<PolicyEvents[E]>): void {
    this.emit(event, ...args);
  }

  getRegistry(): BucketRegistry {
    return this.registry;
  }
}
