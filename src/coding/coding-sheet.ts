/**
 * Coding Sheet Generation
 *
 * Labels stored comments with the dictionary labeler and writes a CSV for
 * manual coding: predictions first, then empty columns for the human coder,
 * then (optionally) the fired rules and matched keywords for auditing.
 */

import { writeFileSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import type { DetectionResult, PredictionColumn, StoredComment } from '../types/index.js';
import { LABELS } from '../types/index.js';
import { CommentCoderError } from '../errors.js';
import type { DictionaryLabeler } from '../labeling/labeler.js';
import { assertCommentText, toPredictionColumns } from '../labeling/labeler.js';
import type { ListCommentsOptions } from '../storage/database.js';
import { resolveOutputPath } from '../utils/paths.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('coding');

// =============================================================================
// Columns
// =============================================================================

export const COMMENT_COLUMNS = [
  'video_id', 'comment_id', 'published_at', 'like_count', 'total_reply_count', 'text',
] as const;

export const PREDICTION_COLUMNS: readonly PredictionColumn[] = LABELS.map(
  (label): PredictionColumn => `pred_${label}`
);

/** Filled in by the human coder */
export const MANUAL_COLUMNS: readonly string[] = [...LABELS, 'unsure', 'coder_memo'];

export const DEBUG_COLUMNS = ['priority_rules', 'detected_keywords'] as const;

export function codingSheetColumns(includeDebug: boolean): string[] {
  return [
    ...COMMENT_COLUMNS,
    ...PREDICTION_COLUMNS,
    ...MANUAL_COLUMNS,
    ...(includeDebug ? DEBUG_COLUMNS : []),
  ];
}

// =============================================================================
// Rows
// =============================================================================

export type CodingRow = Record<string, string | number>;

export interface SkippedRow {
  commentId: string;
  reason: string;
}

export interface CodingRowsResult {
  rows: CodingRow[];
  skipped: SkippedRow[];
}

/**
 * Matched keywords per detected label, label order, as a JSON object string.
 */
export function serializeDetections(detections: DetectionResult): string {
  const detected: Record<string, string[]> = {};
  for (const label of LABELS) {
    const spans = detections[label];
    if (spans.length > 0) {
      detected[label] = spans.map(span => span.keyword);
    }
  }
  return JSON.stringify(detected);
}

export function buildCodingRows(
  comments: readonly StoredComment[],
  labeler: DictionaryLabeler,
  includeDebug: boolean = true
): CodingRowsResult {
  const rows: CodingRow[] = [];
  const skipped: SkippedRow[] = [];

  for (const comment of comments) {
    let text: string;
    try {
      text = assertCommentText(comment.text);
    } catch (error) {
      if (!(error instanceof CommentCoderError)) throw error;
      log.warn(`Skipping comment ${comment.commentId}`, { reason: error.message });
      skipped.push({ commentId: comment.commentId, reason: error.message });
      continue;
    }

    const prediction = labeler.classify(text);
    const row: CodingRow = {
      video_id: comment.videoId,
      comment_id: comment.commentId,
      published_at: comment.publishedAt ?? '',
      like_count: comment.likeCount ?? '',
      total_reply_count: comment.totalReplyCount ?? '',
      text,
      ...toPredictionColumns(prediction.labels),
    };
    for (const column of MANUAL_COLUMNS) {
      row[column] = '';
    }
    if (includeDebug) {
      row.priority_rules = prediction.trace.join(';');
      row.detected_keywords = serializeDetections(prediction.detections);
    }
    rows.push(row);
  }

  return { rows, skipped };
}

// =============================================================================
// Sheet
// =============================================================================

export interface CodingSheetOptions extends ListCommentsOptions {
  outputPath: string;
  includeDebug?: boolean;
}

export interface CodingSheetResult {
  outputPath: string;
  written: number;
  skipped: SkippedRow[];
}

interface CommentSource {
  listComments(options?: ListCommentsOptions): StoredComment[];
}

export function renderCodingSheet(rows: readonly CodingRow[], includeDebug: boolean): string {
  return stringify([...rows], { header: true, columns: codingSheetColumns(includeDebug) });
}

export function generateCodingSheet(
  source: CommentSource,
  labeler: DictionaryLabeler,
  options: CodingSheetOptions
): CodingSheetResult {
  const includeDebug = options.includeDebug ?? true;
  const comments = source.listComments({ limit: options.limit, seed: options.seed });
  const { rows, skipped } = buildCodingRows(comments, labeler, includeDebug);

  const outputPath = resolveOutputPath(options.outputPath);
  writeFileSync(outputPath, renderCodingSheet(rows, includeDebug), 'utf-8');
  log.info(`Generated coding sheet with ${rows.length} comments`, { outputPath, skipped: skipped.length });

  return { outputPath, written: rows.length, skipped };
}
