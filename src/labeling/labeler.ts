/**
 * Dictionary Labeler
 *
 * Detector → Negation Resolver → Priority Rules. Dictionaries are frozen at
 * construction; every call is a pure function of the input text, so the
 * same comment always yields the same verdict and the same trace.
 */

import type {
  LabelVerdict,
  LabelerDictionaries,
  PredictionColumns,
  PredictionResult,
} from '../types/index.js';
import { mapLabels } from '../types/index.js';
import { InvalidInputError } from '../errors.js';
import { DEFAULT_DICTIONARIES, freezeDictionaries } from './dictionaries.js';
import { KeywordDetector } from './detector.js';
import { NegationResolver } from './negation.js';
import { PRIORITY_RULES, applyPriorityRules, type PriorityRule } from './priority-rules.js';

export class DictionaryLabeler {
  readonly dictionaries: LabelerDictionaries;
  private readonly detector: KeywordDetector;
  private readonly negation: NegationResolver;
  private readonly rules: readonly PriorityRule[];

  constructor(
    dictionaries: LabelerDictionaries = DEFAULT_DICTIONARIES,
    rules: readonly PriorityRule[] = PRIORITY_RULES
  ) {
    this.dictionaries = freezeDictionaries(dictionaries);
    this.detector = new KeywordDetector(this.dictionaries);
    this.negation = new NegationResolver(this.dictionaries);
    this.rules = Object.freeze([...rules]);
  }

  /**
   * Full result: final labels, fired rules in order, raw detections.
   */
  classify(text: string): PredictionResult {
    const input = assertCommentText(text);

    const detections = this.detector.detect(input);
    const detected = mapLabels(label => detections[label].length > 0);

    const negated = this.negation.resolve(input, detections, detected);
    const prioritized = applyPriorityRules(detections, negated.verdict, this.rules);

    return {
      labels: prioritized.verdict,
      trace: [...negated.fired, ...prioritized.fired],
      detections,
      negations: negated.negations,
    };
  }

  /**
   * 0/1 per prediction column, for bulk scoring.
   */
  predict(text: string): PredictionColumns {
    return toPredictionColumns(this.classify(text).labels);
  }
}

/**
 * Rejects anything that is not a string before detection runs. Rows read
 * from storage or JSON can carry null or numbers despite their static type.
 */
export function assertCommentText(input: unknown): string {
  if (typeof input !== 'string') {
    throw new InvalidInputError(input);
  }
  return input;
}

export function toPredictionColumns(verdict: LabelVerdict): PredictionColumns {
  const bit = (value: boolean): 0 | 1 => (value ? 1 : 0);
  return {
    pred_VP: bit(verdict.VP),
    pred_E_int: bit(verdict.E_int),
    pred_E_ext: bit(verdict.E_ext),
    pred_Cyn: bit(verdict.Cyn),
    pred_Norm: bit(verdict.Norm),
    pred_Info: bit(verdict.Info),
    pred_Mobi: bit(verdict.Mobi),
  };
}

export function createLabeler(dictionaries?: LabelerDictionaries): DictionaryLabeler {
  return new DictionaryLabeler(dictionaries);
}
