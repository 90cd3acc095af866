import { VerificationRejectedError } from '@relaygate/core';
import type { RouteResult } from './controller.js';

/**
 * The answer of an accepted or exhausted route, or null when an exhausted
 * ladder produced nothing usable.
 *
 * @throws VerificationRejectedError for a rejected route
 */
export function unwrapAnswer(result: RouteResult): string | null {
  if (result.terminalState === 'rejected') {
    const reason = result.rejection?.reason ?? 'judge_failure';
    throw new VerificationRejectedError(
      result.rejection?.message ?? 'The answer could not be verified',
      reason,
      result.requestId,
    );
  }
  return result.finalAnswer;
}
