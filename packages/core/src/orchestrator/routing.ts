/**
 * Confidence aggregation and routing thresholds.
 */

import { clamp01 } from '../text';
import type { OrderClass, RoutingStatus, SubsidyMatch, ValidatorStatus } from '../types';

export const NO_PARTIES_PENALTY = 0.5;
export const NO_MATCHES_PENALTY = 0.5;
export const SUPPLEMENT_PENALTY = 0.9;
const NEUTRAL = 0.5;

export interface ConfidenceInputs {
  classifierConfidence: number;
  partyCount: number;
  matches: readonly SubsidyMatch[];
  orderClass: OrderClass;
  validatorStatus: ValidatorStatus;
  validatorFailureDiscount: number;
}

/**
 * Unweighted mean of the four signals (the fourth is the lowest lexical match
 * score), then the post-aggregation penalties.
 * A failed validator discounts the result; a skipped one does not.
 */
export function aggregateConfidence(inputs: ConfidenceInputs): number {
  const hasParties = inputs.partyCount > 0;
  const hasMatches = inputs.matches.length > 0;
  const weakestMatch = hasMatches ? Math.min(...inputs.matches.map((m) => m.score)) : NEUTRAL;

  const signals = [
    clamp01(inputs.classifierConfidence),
    hasParties ? 1 : 0,
    hasMatches ? 1 : NEUTRAL,
    clamp01(weakestMatch),
  ];
  let confidence = signals.reduce((sum, s) => sum + s, 0) / signals.length;

  if (!hasParties) confidence *= NO_PARTIES_PENALTY;
  if (!hasMatches) confidence *= NO_MATCHES_PENALTY;
  if (inputs.orderClass === 'supplement') confidence *= SUPPLEMENT_PENALTY;
  if (inputs.validatorStatus === 'unavailable' || inputs.validatorStatus === 'malformed') {
    confidence *= inputs.validatorFailureDiscount;
  }

  return clamp01(confidence);
}

export function routeByConfidence(
  confidence: number,
  thresholds: { autoProcessThreshold: number; humanReviewThreshold: number }
): RoutingStatus {
  if (confidence >= thresholds.autoProcessThreshold) return 'automatic';
  if (confidence >= thresholds.humanReviewThreshold) return 'human_review';
  return 'manual_analysis';
}
