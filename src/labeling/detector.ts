/**
 * Keyword Detector
 *
 * Scans one comment against every label dictionary and records each
 * matching trigger with its first offset. Matching is case-folded and
 * script-aware:
 * - Latin-script keywords: compiled to a boundary-checked regex (whole words)
 * - Everything else (Japanese, CJK): plain substring containment,
 *   since those scripts have no word separators
 */

import type { DetectionResult, KeywordSpan, Label, LabelerDictionaries } from '../types/index.js';
import { mapLabels } from '../types/index.js';

// =============================================================================
// Matchers
// =============================================================================

export interface KeywordMatcher {
  keyword: string;
  /** Offset of the first match in case-folded text, or -1 */
  find(foldedText: string): number;
}

const LATIN_KEYWORD = /^[\p{Script=Latin}\p{N}\s'’-]+$/u;
const HAS_LETTER = /\p{L}/u;

export function isLatinKeyword(keyword: string): boolean {
  return LATIN_KEYWORD.test(keyword) && HAS_LETTER.test(keyword);
}

export function foldCase(text: string): string {
  return text.toLowerCase();
}

/**
 * Build the matcher for a single keyword.
 */
export function compileMatcher(keyword: string): KeywordMatcher {
  const folded = foldCase(keyword);

  if (isLatinKeyword(keyword)) {
    const escaped = folded.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    // \b is ASCII-only; look-arounds keep accented letters inside words
    const regex = new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, 'u');
    return {
      keyword,
      find(foldedText) {
        const match = regex.exec(foldedText);
        return match ? match.index : -1;
      },
    };
  }

  return {
    keyword,
    find(foldedText) {
      return foldedText.indexOf(folded);
    },
  };
}

// =============================================================================
// Detector
// =============================================================================

export class KeywordDetector {
  private readonly matchers: Readonly<Record<Label, readonly KeywordMatcher[]>>;

  constructor(dictionaries: LabelerDictionaries) {
    this.matchers = Object.freeze(
      mapLabels(label => Object.freeze(dictionaries.labels[label].map(compileMatcher)))
    );
  }

  /**
   * Every label is scanned; spans follow dictionary order, one per keyword.
   */
  detect(text: string): DetectionResult {
    const folded = foldCase(text);
    return mapLabels(label => scan(folded, this.matchers[label]));
  }
}

/**
 * Scan already case-folded text with a list of matchers.
 */
export function scan(foldedText: string, matchers: readonly KeywordMatcher[]): KeywordSpan[] {
  const spans: KeywordSpan[] = [];
  if (foldedText.length === 0) return spans;

  for (const matcher of matchers) {
    const offset = matcher.find(foldedText);
    if (offset >= 0) {
      spans.push({ keyword: matcher.keyword, offset });
    }
  }
  return spans;
}
