import { setTimeout as sleep } from 'timers/promises';
import { CancelledError } from '../errors';
import { WaitBudget } from '../types';

export interface WaitOptions extends WaitBudget {
  /** Absolute wall-clock deadline in epoch milliseconds */
  deadline?: number;
  signal?: AbortSignal;
  /** Label used in cancellation errors */
  label?: string;
  now?: () => number;
}

export type PollOutcome<T> = { done: true; value: T } | { done: false };

export const ready = <T>(value: T): PollOutcome<T> => ({ done: true, value });
export const notReady: { done: false } = { done: false };

/**
 * Runs `probe` until it reports done, at most `maxAttempts` times with a fixed
 * `intervalMs` pause between attempts. No pause follows the last attempt.
 *
 * The signal is checked before each attempt and interrupts the pause; a
 * deadline stops the loop once the next attempt would start past it.
 * Errors thrown by `probe` propagate immediately.
 *
 * @returns the value of the first successful probe
 * @throws the error built by `onExhausted` when attempts or time run out
 */
export async function waitFor<T>(
  probe: (attempt: number) => Promise<PollOutcome<T>>,
  options: WaitOptions,
  onExhausted: (attempts: number) => Error
): Promise<T> {
  const now = options.now ?? Date.now;
  const label = options.label ?? 'Wait';
  let attempts = 0;

  while (attempts < options.maxAttempts) {
    if (options.signal?.aborted) {
      throw new CancelledError(label);
    }

    attempts++;
    const outcome = await probe(attempts);
    if (outcome.done) {
      return outcome.value;
    }

    if (attempts >= options.maxAttempts) {
      break;
    }

    if (options.deadline !== undefined && now() + options.intervalMs > options.deadline) {
      break;
    }

    try {
      await sleep(options.intervalMs, undefined, { signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError(label);
      }
      throw error;
    }
  }

  throw onExhausted(attempts);
}
