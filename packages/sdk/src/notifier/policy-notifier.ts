/**
 * Coarse-grained status of a policy domain, combined from the components
 * that drive it. This is the only status that leaves the engine; raw
 * transport codes stop at the controller.
 *
 * @module notifier/policy-notifier
 */

export type SubsystemState =
  | 'unenrolled'
  | 'bad_gaia_token'
  | 'unmanaged'
  | 'network_error'
  | 'local_error'
  | 'token_fetched'
  | 'success';

export type ErrorDetails =
  | 'no_details'
  | 'dmtoken_network_error'
  | 'policy_network_error'
  | 'bad_dmtoken'
  | 'policy_local_error'
  | 'signature_mismatch'
  | 'bad_serial_number'
  | 'missing_licenses';

export type NotifierSource = 'token_fetcher' | 'policy_controller' | 'policy_cache';

export interface PolicyNotifierObserver {
  onStateChanged(state: SubsystemState, details: ErrorDetails): void;
}

interface SourceStatus {
  state: SubsystemState;
  details: ErrorDetails;
}

const INITIAL: SourceStatus = { state: 'unenrolled', details: 'no_details' };

export class PolicyNotifier {
  private readonly sources: Record<NotifierSource, SourceStatus> = {
    token_fetcher: INITIAL,
    policy_controller: INITIAL,
    policy_cache: INITIAL,
  };
  private combined: SourceStatus = INITIAL;
  private readonly observers = new Set<PolicyNotifierObserver>();

  inform(state: SubsystemState, details: ErrorDetails, source: NotifierSource): void {
    this.sources[source] = { state, details };
    const next = this.recompute();
    if (next.state === this.combined.state && next.details === this.combined.details) {
      return;
    }
    this.combined = next;
    for (const observer of [...this.observers]) {
      observer.onStateChanged(next.state, next.details);
    }
  }

  state(): SubsystemState {
    return this.combined.state;
  }

  errorDetails(): ErrorDetails {
    return this.combined.details;
  }

  addObserver(observer: PolicyNotifierObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: PolicyNotifierObserver): void {
    this.observers.delete(observer);
  }

  // Unmanaged from anyone wins. Otherwise components are asked in the order
  // they do their work; one still reporting 'unenrolled' has no opinion.
  private recompute(): SourceStatus {
    const { token_fetcher: fetcher, policy_controller: controller, policy_cache: cache } = this.sources;

    if ([fetcher, controller, cache].some((s) => s.state === 'unmanaged')) {
      return { state: 'unmanaged', details: 'no_details' };
    }
    if (fetcher.state === 'network_error' || fetcher.state === 'bad_gaia_token') {
      return fetcher;
    }
    if (controller.state === 'network_error') {
      return controller;
    }
    if (fetcher.state === 'success' && controller.state !== 'success') {
      return { state: 'token_fetched', details: 'no_details' };
    }
    if (cache.state === 'local_error' || cache.state === 'success') {
      return cache;
    }
    return INITIAL;
  }
}
