import type { ICancelableComputation } from '../../types/cancelable-computation';
import type { ForwardInputs } from '../../types/forward';
import type { Operator } from '../../operator/operator';

/**
 * One replica of a fan-out submitted to a remote executor
 */
export interface RemoteSubmission {
  readonly operator: Operator;
  readonly inputs: ForwardInputs;

  /**
   * Zero-based replica index
   */
  readonly replica: number;
}

/**
 * Handle to a remote executor used by remote fan-out
 * @category Providers
 */
export interface IRemoteHandle {
  /**
   * Submits a replica. Returning a cancelable computation lets cancellation
   * and timeouts stop the remote work.
   */
  submit(submission: RemoteSubmission): ICancelableComputation<unknown> | Promise<unknown>;
}
