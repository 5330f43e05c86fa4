/**
 * Keyword Dictionaries for Election Comment Coding
 *
 * Trigger phrases per label, plus negation patterns for labels that can be
 * cancelled by a co-occurring phrase (currently VP only).
 *
 * Japanese triggers are matched as substrings: no stemming, so every
 * surface variant (投票行く / 投票いく / 投票いき) is listed explicitly.
 * Latin-script triggers, if any are added, match as whole words.
 */

import type {
  LabelDictionaries,
  LabelerDictionaries,
  NegationDictionary,
} from '../types/index.js';
import { mapLabels } from '../types/index.js';

// =============================================================================
// Label Dictionaries
// =============================================================================

/**
 * Voting intention - reporting or announcing a vote
 */
export const VP_KEYWORDS = [
  '投票行く', '投票いく', '投票いき', '投票に行', '行ってくる', '行ってきた',
  '投票した', '期日前', '投票する', '選挙行', '投票所',
  '投票済', '投票しよう',
] as const;

/**
 * External efficacy - the system responds to citizens
 */
export const E_EXT_KEYWORDS = [
  '一票でも', '変えられる', '声が届く',
  '政治を変える', '社会を変える', '民主主義', '主権在民',
  '私たちの声',
] as const;

/**
 * Internal efficacy - the commenter informs and judges for themselves
 */
export const E_INT_KEYWORDS = [
  '調べる', '調べて', '調べた', '勉強する', 'ちゃんと考え',
  '理解して', '判断する', '情報収集', '比較して',
] as const;

/**
 * Cynicism - distrust that participation matters
 */
export const CYN_KEYWORDS = [
  'どうせ変わらない', '意味ない', '無駄', '変わらん',
  '茶番', '出来レース', '利権', '癒着', '腐って',
] as const;

/**
 * Normative appeal - voting framed as duty or responsibility
 */
export const NORM_KEYWORDS = [
  '行くべき', '行かなきゃ', '行かないのは', '責任',
  '国民の義務', '権利を行使',
] as const;

/**
 * Information seeking - questions about procedure, candidates, policy
 */
export const INFO_KEYWORDS = [
  'どこで', 'やり方', '方法', '候補者', '政策',
  '何時から', '持ち物', '場所', '投票用紙',
] as const;

/**
 * Mobilization - inviting others or spreading the word
 */
export const MOBI_KEYWORDS = [
  'みんなで', '一緒に行こう', '友達と', '家族と',
  '声をかけて', '誘って', '広めて', 'シェアして',
  '拡散', '周りの人',
] as const;

// =============================================================================
// Negation Dictionaries
// =============================================================================

/**
 * "Not going to vote" phrasings. Several contain a VP trigger
 * (投票に行かない ⊃ 投票に行), which is why negation is checked
 * over the whole text rather than next to the matched span.
 */
export const VP_NEGATIONS: NegationDictionary = {
  label: 'VP',
  patterns: [
    '投票行かない', '投票に行かない', '投票しない', '選挙行かない',
    '投票できない', '投票やめ', '投票いかない',
  ],
};

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_LABEL_KEYWORDS: LabelDictionaries = {
  VP: VP_KEYWORDS,
  E_int: E_INT_KEYWORDS,
  E_ext: E_EXT_KEYWORDS,
  Cyn: CYN_KEYWORDS,
  Norm: NORM_KEYWORDS,
  Info: INFO_KEYWORDS,
  Mobi: MOBI_KEYWORDS,
};

export const DEFAULT_DICTIONARIES: LabelerDictionaries = freezeDictionaries({
  labels: DEFAULT_LABEL_KEYWORDS,
  negations: [VP_NEGATIONS],
});

/**
 * Copy and freeze a dictionary configuration so later mutation of the
 * caller's arrays cannot change labeling results. Missing labels get an
 * empty list; keyword order is kept, duplicates are dropped.
 */
export function freezeDictionaries(
  source: { labels: Partial<LabelDictionaries>; negations?: readonly NegationDictionary[] }
): LabelerDictionaries {
  const labels = mapLabels<readonly string[]>(label =>
    Object.freeze(dedupe(source.labels[label] ?? []))
  );

  const negations = (source.negations ?? []).map(negation =>
    Object.freeze({
      label: negation.label,
      patterns: Object.freeze(dedupe(negation.patterns)),
    })
  );

  return Object.freeze({
    labels: Object.freeze(labels),
    negations: Object.freeze(negations),
  });
}

function dedupe(keywords: readonly string[]): string[] {
  return [...new Set(keywords.filter(keyword => keyword.length > 0))];
}
