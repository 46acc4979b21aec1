/**
 * Confidence Amplification
 *
 * Repeats an independent one-sided trial up to k times. Which direction a
 * verifier can err in decides how trials combine:
 *
 * - `all`: a single false is conclusive, so the verdict is true only when
 *   every trial agrees. A false accept survives k trials with probability
 *   at most (per-trial error)^k.
 * - `any`: a single true is conclusive, so the verdict is false only when
 *   every trial fails. A false reject survives k trials with probability
 *   at most (per-trial error)^k.
 */

import type { AmplificationResult, AmplificationRule } from '../types.js';
import { invalidTrialCountError } from '../errors.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('amplifier');

/**
 * @throws IdentityTestingError (INVALID_TRIAL_COUNT) unless k is a positive safe integer
 */
export function validateTrialCount(k: number): void {
  if (!Number.isSafeInteger(k) || k < 1) {
    throw invalidTrialCountError(k);
  }
}

/**
 * Run up to k trials and combine them with the given rule
 *
 * Stops at the first conclusive trial. `errorBound` is the probability
 * that all k trials err, reported only when the verdict points in the
 * direction that can be wrong.
 *
 * @param trial - One independent trial; receives its 0-based index
 * @param k - Maximum number of trials
 * @param rule - How to combine trial outcomes
 * @param errorBound - Error probability after k agreeing trials
 */
export function amplify(
  trial: (index: number) => boolean,
  k: number,
  rule: AmplificationRule,
  errorBound: number
): AmplificationResult {
  validateTrialCount(k);

  const conclusive = rule === 'any';

  for (let i = 0; i < k; i++) {
    if (trial(i) === conclusive) {
      debugLog('Verdict settled early', { rule, trial: i + 1, of: k, verdict: conclusive });
      return {
        verdict: conclusive,
        trialsRun: i + 1,
        trialsRequested: k,
        errorBound: 0,
      };
    }
  }

  debugLog('All trials agreed', { rule, trials: k, verdict: !conclusive, errorBound });
  return {
    verdict: !conclusive,
    trialsRun: k,
    trialsRequested: k,
    errorBound,
  };
}

/**
 * False-accept bound for k Freivalds trials: 2^-k
 */
export function freivaldsErrorBound(k: number): number {
  validateTrialCount(k);
  return 2 ** -k;
}

/**
 * False-reject bound for k matching trials on n vertices per side: (n/p)^k
 */
export function matchingErrorBound(n: number, modulus: bigint, k: number): number {
  validateTrialCount(k);
  const perTrial = Math.min(1, n / Number(modulus));
  return perTrial ** k;
}
