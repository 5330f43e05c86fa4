/**
 * Negation Resolver
 *
 * Runs after detection and before the priority rules. A label with a
 * negation dictionary is cancelled when it was detected AND one of its
 * negation patterns occurs anywhere in the text. The positive span is not
 * consulted: 投票に行かない both triggers VP (投票に行) and negates it.
 */

import type {
  DetectionResult,
  KeywordSpan,
  Label,
  LabelVerdict,
  LabelerDictionaries,
  NegationDictionary,
  NegationRuleId,
  RuleId,
} from '../types/index.js';
import { compileMatcher, foldCase, scan, type KeywordMatcher } from './detector.js';

export interface NegationOutcome {
  verdict: LabelVerdict;
  fired: RuleId[];
  negations: Partial<Record<Label, readonly KeywordSpan[]>>;
}

interface CompiledNegation {
  label: Label;
  ruleId: NegationRuleId;
  matchers: readonly KeywordMatcher[];
}

export class NegationResolver {
  private readonly negations: readonly CompiledNegation[];

  constructor(dictionaries: LabelerDictionaries) {
    this.negations = Object.freeze(dictionaries.negations.map(compileNegation));
  }

  resolve(text: string, detections: DetectionResult, verdict: LabelVerdict): NegationOutcome {
    const folded = foldCase(text);
    const next: LabelVerdict = { ...verdict };
    const fired: RuleId[] = [];
    const negations: Partial<Record<Label, readonly KeywordSpan[]>> = {};

    for (const negation of this.negations) {
      if (detections[negation.label].length === 0) continue;

      const spans = scan(folded, negation.matchers);
      if (spans.length === 0) continue;

      next[negation.label] = false;
      negations[negation.label] = spans;
      if (!fired.includes(negation.ruleId)) {
        fired.push(negation.ruleId);
      }
    }

    return { verdict: next, fired, negations };
  }
}

function compileNegation(negation: NegationDictionary): CompiledNegation {
  return {
    label: negation.label,
    ruleId: negationRuleId(negation.label),
    matchers: Object.freeze(negation.patterns.map(compileMatcher)),
  };
}

export function negationRuleId(label: Label): NegationRuleId {
  return `${label}_negated`;
}
