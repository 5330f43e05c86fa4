/**
 * comment-coder - Library Exports
 *
 * The CLI lives in `cli.ts`; everything a script or notebook needs for
 * collection, storage and labeling is exported from here.
 */

export * from './types/index.js';
export * from './errors.js';

export {
  DictionaryLabeler,
  createLabeler,
  assertCommentText,
  toPredictionColumns,
} from './labeling/labeler.js';
export {
  DEFAULT_DICTIONARIES,
  DEFAULT_LABEL_KEYWORDS,
  VP_NEGATIONS,
  freezeDictionaries,
} from './labeling/dictionaries.js';
export { KeywordDetector, compileMatcher, isLatinKeyword } from './labeling/detector.js';
export { NegationResolver, negationRuleId } from './labeling/negation.js';
export {
  PRIORITY_RULES,
  CYNICISM_OVERRIDE,
  MOBILIZATION_ENHANCEMENT,
  applyPriorityRules,
} from './labeling/priority-rules.js';
export type { PriorityRule, RuleState, RuleOutcome } from './labeling/priority-rules.js';

export { YouTubeClient } from './api/youtube-client.js';
export type { YouTubeClientOptions, FetchCommentsOptions, FetchLike } from './api/youtube-client.js';
export { CommentCollector } from './collect/collector.js';
export type { CollectOptions, CollectorOptions, ProgressCallback } from './collect/collector.js';

export { CommentDatabase, createCommentDatabase } from './storage/database.js';
export type { SaveResult, ListCommentsOptions, VideoCommentCount } from './storage/database.js';
export { writeCommentsCsv, commentsToCsv } from './storage/csv.js';

export {
  generateCodingSheet,
  buildCodingRows,
  renderCodingSheet,
  serializeDetections,
  codingSheetColumns,
} from './coding/coding-sheet.js';
export type { CodingSheetOptions, CodingSheetResult, SkippedRow } from './coding/coding-sheet.js';

export { loadConfig, loadEnvFile } from './config.js';
export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
