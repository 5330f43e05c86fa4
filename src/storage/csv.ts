/**
 * Raw comment export to CSV
 */

import { writeFileSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import type { CommentRecord } from '../types/index.js';
import { resolveOutputPath } from '../utils/paths.js';

export const COMMENT_CSV_COLUMNS = [
  'videoId',
  'videoPublishedAt',
  'commentId',
  'publishedAt',
  'updatedAt',
  'likeCount',
  'totalReplyCount',
  'text',
] as const satisfies readonly (keyof CommentRecord)[];

export function commentsToCsv(comments: readonly CommentRecord[]): string {
  return stringify([...comments], { header: true, columns: [...COMMENT_CSV_COLUMNS] });
}

/**
 * Write comments to `csvPath`, replacing any existing file.
 * Nothing is written for an empty list.
 * @returns whether a file was written
 */
export function writeCommentsCsv(csvPath: string, comments: readonly CommentRecord[]): boolean {
  if (comments.length === 0) return false;
  writeFileSync(resolveOutputPath(csvPath), commentsToCsv(comments), 'utf-8');
  return true;
}
