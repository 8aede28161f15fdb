import { describe, it, expect, vi } from 'vitest';
import {
  attemptInOrder,
  AllAttemptsFailedError,
  type AttemptOutcome,
  type ProviderAttempt,
} from '../assistant/attempts';

function attempt(provider: string, outcome: AttemptOutcome<string> | Error) {
  const run = vi.fn(async (): Promise<AttemptOutcome<string>> => {
    if (outcome instanceof Error) throw outcome;
    return outcome;
  });
  const providerAttempt: ProviderAttempt<string> = { provider, run };
  return { attempt: providerAttempt, run };
}

const success = (value: string): AttemptOutcome<string> => ({ status: 'success', value });
const fatal = (message: string): AttemptOutcome<string> => ({ status: 'fatal', error: new Error(message) });

describe('attemptInOrder', () => {
  it('stops at the first success', async () => {
    const first = attempt('remote', success('saved remotely'));
    const second = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, second.attempt]);

    expect(result).toEqual({ value: 'saved remotely', provider: 'remote', attempted: ['remote'], failures: [] });
    expect(second.run).not.toHaveBeenCalled();
  });

  it('moves on after a fatal failure and reports it', async () => {
    const first = attempt('remote', fatal('service down'));
    const second = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, second.attempt]);

    expect(result.provider).toBe('local');
    expect(result.value).toBe('saved locally');
    expect(result.attempted).toEqual(['remote', 'local']);
    expect(result.failures.map(f => [f.provider, f.error.message])).toEqual([['remote', 'service down']]);
  });

  it('treats a thrown error as fatal', async () => {
    const first = attempt('remote', new Error('socket hang up'));
    const second = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, second.attempt]);

    expect(result.provider).toBe('local');
    expect(result.failures[0].error.message).toBe('socket hang up');
  });

  it('runs the follow-up of a retryable failure before moving on', async () => {
    const retry = attempt('remote-retry', success('saved without Due'));
    const first = attempt('remote', { status: 'retryable', error: new Error('Due rejected'), retry: retry.attempt });
    const local = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, local.attempt]);

    expect(result.provider).toBe('remote-retry');
    expect(result.value).toBe('saved without Due');
    expect(result.attempted).toEqual(['remote', 'remote-retry']);
    expect(retry.run).toHaveBeenCalledTimes(1);
    expect(local.run).not.toHaveBeenCalled();
  });

  it('never retries a follow-up, even when it asks for it', async () => {
    const third = attempt('remote-third', success('should not happen'));
    const retry = attempt('remote-retry', { status: 'retryable', error: new Error('still rejected'), retry: third.attempt });
    const first = attempt('remote', { status: 'retryable', error: new Error('Due rejected'), retry: retry.attempt });
    const local = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, local.attempt]);

    expect(third.run).not.toHaveBeenCalled();
    expect(retry.run).toHaveBeenCalledTimes(1);
    expect(result.provider).toBe('local');
    expect(result.attempted).toEqual(['remote', 'remote-retry', 'local']);
    expect(result.failures.map(f => f.error.message)).toEqual(['Due rejected', 'still rejected']);
  });

  it('moves on after a retryable failure without a follow-up', async () => {
    const first = attempt('remote', { status: 'retryable', error: new Error('busy') });
    const local = attempt('local', success('saved locally'));

    const result = await attemptInOrder([first.attempt, local.attempt]);

    expect(result.provider).toBe('local');
    expect(result.attempted).toEqual(['remote', 'local']);
  });

  it('rejects with the last error when every attempt fails', async () => {
    const first = attempt('remote', fatal('service down'));
    const second = attempt('local', new Error('disk full'));

    await expect(attemptInOrder([first.attempt, second.attempt])).rejects.toThrow('disk full');
  });

  it('rejects when given no attempts', async () => {
    await expect(attemptInOrder([])).rejects.toBeInstanceOf(AllAttemptsFailedError);
  });
});
