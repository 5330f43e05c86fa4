/**
 * comment-coder Database Layer
 * SQLite (better-sqlite3); comments are deduplicated by their YouTube id
 */

import { z } from 'zod';
import type { CommentRecord, StoredComment, VideoInfo } from '../types/index.js';
import { StorageError } from '../errors.js';
import { resolveOutputPath } from '../utils/paths.js';
import { createDatabase, type SqliteDatabase } from './sqlite-adapter.js';

export const SCHEMA_VERSION = 1;

export interface SaveResult {
  inserted: number;
  skipped: number;
}

export interface ListCommentsOptions {
  limit?: number;
  /** Deterministic pseudo-random ordering; same seed, same order */
  seed?: number;
}

export interface VideoCommentCount {
  videoId: string;
  publishedAt: string | null;
  comments: number;
}

// =============================================================================
// Row Schemas
// =============================================================================

const StoredCommentRow = z.object({
  comment_id: z.string(),
  video_id: z.string(),
  published_at: z.string().nullable(),
  like_count: z.number().nullable(),
  total_reply_count: z.number().nullable(),
  text: z.string().nullable(),
});

const VideoCountRow = z.object({
  video_id: z.string(),
  published_at: z.string().nullable(),
  comments: z.number(),
});

const CountRow = z.object({ count: z.number() });

const VersionRow = z.object({ version: z.number() });

export class CommentDatabase {
  private db: SqliteDatabase | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Open the database and create the schema (must be called before use)
   */
  init(): void {
    if (this.db) return;

    const db = createDatabase(resolveOutputPath(this.dbPath));
    db.pragma('journal_mode = WAL');
    initializeSchema(db);
    this.db = db;
  }

  private connection(): SqliteDatabase {
    if (!this.db) {
      throw new StorageError('Database not initialized. Call db.init() first.');
    }
    return this.db;
  }

  getSchemaVersion(): number | null {
    return readSchemaVersion(this.connection());
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Record video metadata; later lookups overwrite earlier ones
   */
  saveVideo(info: VideoInfo): void {
    this.connection().prepare(`
      INSERT INTO videos (video_id, published_at, title, channel)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(video_id) DO UPDATE SET
        published_at = excluded.published_at,
        title = COALESCE(excluded.title, videos.title),
        channel = COALESCE(excluded.channel, videos.channel)
    `).run(info.videoId, info.publishedAt, info.title ?? null, info.channel ?? null);
  }

  /**
   * Insert comments in one transaction. Ids already stored are skipped,
   * never updated.
   */
  saveComments(comments: readonly CommentRecord[]): SaveResult {
    const db = this.connection();
    if (comments.length === 0) {
      return { inserted: 0, skipped: 0 };
    }

    const insertVideo = db.prepare(`
      INSERT OR IGNORE INTO videos (video_id, published_at) VALUES (?, ?)
    `);
    const insertComment = db.prepare(`
      INSERT OR IGNORE INTO comments (
        comment_id, video_id, video_published_at,
        published_at, updated_at, like_count,
        total_reply_count, text, author_channel_id
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    return db.transaction(() => {
      for (const comment of comments) {
        insertVideo.run(comment.videoId, comment.videoPublishedAt);
      }

      let inserted = 0;
      for (const comment of comments) {
        const result = insertComment.run(
          comment.commentId,
          comment.videoId,
          comment.videoPublishedAt,
          comment.publishedAt,
          comment.updatedAt,
          comment.likeCount,
          comment.totalReplyCount,
          comment.text,
          comment.authorChannelId ?? null
        );
        inserted += result.changes;
      }
      return { inserted, skipped: comments.length - inserted };
    });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  countComments(videoId?: string): number {
    const db = this.connection();
    const row = videoId === undefined
      ? db.prepare(`SELECT COUNT(*) AS count FROM comments`).get()
      : db.prepare(`SELECT COUNT(*) AS count FROM comments WHERE video_id = ?`).get(videoId);
    return CountRow.parse(row).count;
  }

  /**
   * Comments for coding. Without a seed the order is comment_id; with a seed
   * it is ((length(comment_id) * seed) % 100), then comment_id.
   */
  listComments(options: ListCommentsOptions = {}): StoredComment[] {
    const db = this.connection();
    const order = options.seed === undefined
      ? 'comment_id'
      : '((length(comment_id) * @seed) % 100), comment_id';

    const rows = db.prepare(`
      SELECT comment_id, video_id, published_at, like_count, total_reply_count, text
      FROM comments
      ORDER BY ${order}
      LIMIT @limit
    `).all({
      limit: options.limit ?? -1,
      ...(options.seed === undefined ? {} : { seed: options.seed }),
    });

    return rows.map(row => {
      const parsed = StoredCommentRow.parse(row);
      return {
        commentId: parsed.comment_id,
        videoId: parsed.video_id,
        publishedAt: parsed.published_at,
        likeCount: parsed.like_count,
        totalReplyCount: parsed.total_reply_count,
        text: parsed.text,
      };
    });
  }

  /**
   * Stored comment totals per video, in video_id order
   */
  countByVideo(): VideoCommentCount[] {
    const rows = this.connection().prepare(`
      SELECT v.video_id AS video_id, v.published_at AS published_at, COUNT(c.comment_id) AS comments
      FROM videos v
      LEFT JOIN comments c ON c.video_id = v.video_id
      GROUP BY v.video_id
      ORDER BY v.video_id
    `).all();

    return rows.map(row => {
      const parsed = VideoCountRow.parse(row);
      return { videoId: parsed.video_id, publishedAt: parsed.published_at, comments: parsed.comments };
    });
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

// =============================================================================
// Schema
// =============================================================================

function initializeSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS videos (
      video_id TEXT PRIMARY KEY,
      published_at TEXT,
      title TEXT,
      channel TEXT
    );

    CREATE TABLE IF NOT EXISTS comments (
      comment_id TEXT PRIMARY KEY,
      video_id TEXT,
      video_published_at TEXT,
      published_at TEXT,
      updated_at TEXT,
      like_count INTEGER,
      total_reply_count INTEGER,
      text TEXT,
      author_channel_id TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_comments_video ON comments(video_id);
  `);

  if (readSchemaVersion(db) === null) {
    db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
  }
}

function readSchemaVersion(db: SqliteDatabase): number | null {
  const row = db.prepare(`SELECT version FROM schema_version ORDER BY rowid DESC LIMIT 1`).get();
  return row === undefined ? null : VersionRow.parse(row).version;
}

/**
 * Create and initialize a CommentDatabase instance
 */
export function createCommentDatabase(dbPath: string): CommentDatabase {
  const db = new CommentDatabase(dbPath);
  db.init();
  return db;
}
