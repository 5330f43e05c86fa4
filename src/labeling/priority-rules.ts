/**
 * Priority Rules
 *
 * Ordered conflict-resolution rules applied after negation. Each rule reads
 * the current verdict, so a label cancelled by negation drives no rule, and
 * returns a new verdict plus whether it fired. Rules run strictly in array
 * order: a label zeroed by an earlier rule is already false when a later
 * rule looks at it.
 */

import type { DetectionResult, Label, LabelVerdict, RuleId } from '../types/index.js';

// =============================================================================
// Rule Types
// =============================================================================

export interface RuleState {
  /** Raw detector output; never modified by rules */
  readonly detections: DetectionResult;
  readonly verdict: Readonly<LabelVerdict>;
}

export interface RuleOutcome {
  verdict: LabelVerdict;
  fired: boolean;
}

export interface PriorityRule {
  id: RuleId;
  description: string;
  apply(state: RuleState): RuleOutcome;
}

export interface PriorityOutcome {
  verdict: LabelVerdict;
  fired: RuleId[];
}

// =============================================================================
// Rules
// =============================================================================

/**
 * Labels cynicism contradicts. E_int and Info are deliberately absent: a
 * commenter can be cynical while still studying candidates or asking how
 * to vote.
 */
export const CYNICISM_OVERRIDES: readonly Label[] = ['VP', 'E_ext', 'Norm', 'Mobi'];

export const CYNICISM_OVERRIDE: PriorityRule = {
  id: 'Cyn_overrides_positive',
  description: 'Cynicism forces VP, E_ext, Norm and Mobi to false',
  apply({ verdict }) {
    if (!verdict.Cyn) {
      return { verdict: { ...verdict }, fired: false };
    }

    const next: LabelVerdict = { ...verdict };
    let overridden = false;
    for (const label of CYNICISM_OVERRIDES) {
      if (next[label]) overridden = true;
      next[label] = false;
    }
    return { verdict: next, fired: overridden };
  },
};

/**
 * Annotation only: records that Mobi reinforces an already-positive VP.
 */
export const MOBILIZATION_ENHANCEMENT: PriorityRule = {
  id: 'Mobi_enhances_VP',
  description: 'Mobilization alongside a surviving VP, without surviving cynicism',
  apply({ verdict }) {
    const fired = verdict.VP && verdict.Mobi && !verdict.Cyn;
    return { verdict: { ...verdict }, fired };
  },
};

export const PRIORITY_RULES: readonly PriorityRule[] = Object.freeze([
  CYNICISM_OVERRIDE,
  MOBILIZATION_ENHANCEMENT,
]);

// =============================================================================
// Engine
// =============================================================================

export function applyPriorityRules(
  detections: DetectionResult,
  verdict: LabelVerdict,
  rules: readonly PriorityRule[] = PRIORITY_RULES
): PriorityOutcome {
  let current: LabelVerdict = { ...verdict };
  const fired: RuleId[] = [];

  for (const rule of rules) {
    const outcome = rule.apply({ detections, verdict: current });
    current = outcome.verdict;
    if (outcome.fired) {
      fired.push(rule.id);
    }
  }

  return { verdict: current, fired };
}
