import { describe, it, expect, vi } from 'vitest';
import { PolicyNotifier } from '../../src/notifier/policy-notifier.js';

describe('PolicyNotifier', () => {
  it('starts unenrolled', () => {
    const notifier = new PolicyNotifier();
    expect(notifier.state()).toBe('unenrolled');
    expect(notifier.errorDetails()).toBe('no_details');
  });

  it('reports unmanaged from any source', () => {
    const notifier = new PolicyNotifier();
    notifier.inform('network_error', 'dmtoken_network_error', 'token_fetcher');
    notifier.inform('unmanaged', 'no_details', 'policy_cache');

    expect(notifier.state()).toBe('unmanaged');
  });

  it('puts token fetcher errors ahead of controller errors', () => {
    const notifier = new PolicyNotifier();
    notifier.inform('network_error', 'policy_network_error', 'policy_controller');
    notifier.inform('bad_gaia_token', 'no_details', 'token_fetcher');

    expect(notifier.state()).toBe('bad_gaia_token');
  });

  it('reports a controller network error with its details', () => {
    const notifier = new PolicyNotifier();
    notifier.inform('success', 'no_details', 'policy_cache');
    notifier.inform('network_error', 'bad_dmtoken', 'policy_controller');

    expect(notifier.state()).toBe('network_error');
    expect(notifier.errorDetails()).toBe('bad_dmtoken');
  });

  it('reports token_fetched between registration and the first policy', () => {
    const notifier = new PolicyNotifier();
    notifier.inform('success', 'no_details', 'token_fetcher');
    expect(notifier.state()).toBe('token_fetched');

    notifier.inform('success', 'no_details', 'policy_controller');
    notifier.inform('success', 'no_details', 'policy_cache');
    expect(notifier.state()).toBe('success');
  });

  it('falls back to the cache status', () => {
    const notifier = new PolicyNotifier();
    notifier.inform('local_error', 'policy_local_error', 'policy_cache');

    expect(notifier.state()).toBe('local_error');
    expect(notifier.errorDetails()).toBe('policy_local_error');
  });

  it('notifies observers only when the combined status changes', () => {
    const notifier = new PolicyNotifier();
    const onStateChanged = vi.fn();
    notifier.addObserver({ onStateChanged });

    notifier.inform('success', 'no_details', 'policy_cache');
    notifier.inform('success', 'no_details', 'policy_controller');
    notifier.inform('network_error', 'policy_network_error', 'policy_controller');

    expect(onStateChanged.mock.calls).toEqual([
      ['success', 'no_details'],
      ['network_error', 'policy_network_error'],
    ]);
  });

  it('stops notifying removed observers', () => {
    const notifier = new PolicyNotifier();
    const observer = { onStateChanged: vi.fn() };
    notifier.addObserver(observer);
    notifier.removeObserver(observer);

    notifier.inform('unmanaged', 'no_details', 'policy_controller');
    expect(observer.onStateChanged).not.toHaveBeenCalled();
  });
});
