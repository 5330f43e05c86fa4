/**
 * database.test.ts
 *
 * Comment storage:
 *
 * 1. Fresh DB records the schema version
 * 2. Duplicate comment ids are skipped, never updated
 * 3. Video metadata upserts keep known titles
 * 4. Seeded listing is deterministic and differs from id order
 * 5. Data survives closing and reopening a file database
 */

import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { tmpdir } from 'os';
import { join } from 'path';
import { mkdtempSync, rmSync } from 'fs';

import { CommentDatabase, SCHEMA_VERSION, createCommentDatabase } from './database.js';
import { createDatabase } from './sqlite-adapter.js';
import { StorageError } from '../errors.js';
import type { CommentRecord } from '../types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const tempDir = mkdtempSync(join(tmpdir(), 'comment-coder-db-'));

after(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function comment(commentId: string, overrides: Partial<CommentRecord> = {}): CommentRecord {
  return {
    commentId,
    videoId: 'vid-1',
    videoPublishedAt: '2024-07-01T00:00:00Z',
    publishedAt: '2024-07-02T10:00:00Z',
    updatedAt: '2024-07-02T10:00:00Z',
    likeCount: 3,
    totalReplyCount: 1,
    text: `text of ${commentId}`,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

describe('CommentDatabase: schema', () => {
  it('records the current schema version once', () => {
    const path = join(tempDir, 'schema.db');
    createCommentDatabase(path).close();
    const db = createCommentDatabase(path);
    try {
      assert.equal(db.getSchemaVersion(), SCHEMA_VERSION);
    } finally {
      db.close();
    }

    const raw = createDatabase(path);
    try {
      assert.deepEqual(raw.prepare('SELECT COUNT(*) AS count FROM schema_version').get(), { count: 1 });
    } finally {
      raw.close();
    }
  });

  it('refuses to work before init()', () => {
    const db = new CommentDatabase(':memory:');
    assert.throws(() => db.countComments(), StorageError);
  });
});

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

describe('CommentDatabase: saveComments', () => {
  it('inserts new comments and skips known ids', () => {
    const db = createCommentDatabase(':memory:');
    try {
      assert.deepEqual(db.saveComments([comment('c1'), comment('c2')]), { inserted: 2, skipped: 0 });
      assert.deepEqual(
        db.saveComments([comment('c2', { text: 'edited' }), comment('c3')]),
        { inserted: 1, skipped: 1 }
      );

      assert.equal(db.countComments(), 3);
      const stored = db.listComments().find(row => row.commentId === 'c2');
      assert.equal(stored?.text, 'text of c2');
    } finally {
      db.close();
    }
  });

  it('returns zero counts for an empty batch', () => {
    const db = createCommentDatabase(':memory:');
    try {
      assert.deepEqual(db.saveComments([]), { inserted: 0, skipped: 0 });
    } finally {
      db.close();
    }
  });

  it('counts per video, including videos without comments', () => {
    const db = createCommentDatabase(':memory:');
    try {
      db.saveVideo({ videoId: 'vid-0', publishedAt: '2024-06-30T00:00:00Z' });
      db.saveComments([comment('c1'), comment('c2'), comment('c3', { videoId: 'vid-2', videoPublishedAt: '' })]);

      assert.equal(db.countComments('vid-1'), 2);
      assert.deepEqual(db.countByVideo(), [
        { videoId: 'vid-0', publishedAt: '2024-06-30T00:00:00Z', comments: 0 },
        { videoId: 'vid-1', publishedAt: '2024-07-01T00:00:00Z', comments: 2 },
        { videoId: 'vid-2', publishedAt: '', comments: 1 },
      ]);
    } finally {
      db.close();
    }
  });
});

describe('CommentDatabase: saveVideo', () => {
  it('keeps an earlier title when a later lookup has none', () => {
    const db = createCommentDatabase(':memory:');
    try {
      db.saveVideo({ videoId: 'vid-1', publishedAt: '2024-07-01T00:00:00Z', title: 'Debate' });
      db.saveVideo({ videoId: 'vid-1', publishedAt: '2024-07-01T12:00:00Z' });

      assert.deepEqual(db.countByVideo(), [
        { videoId: 'vid-1', publishedAt: '2024-07-01T12:00:00Z', comments: 0 },
      ]);
    } finally {
      db.close();
    }
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe('CommentDatabase: listComments', () => {
  const ids = ['zz', 'a', 'mmm', 'b'];

  function seeded(): CommentDatabase {
    const db = createCommentDatabase(':memory:');
    db.saveComments(ids.map(id => comment(id)));
    return db;
  }

  it('orders by comment id without a seed', () => {
    const db = seeded();
    try {
      assert.deepEqual(db.listComments().map(row => row.commentId), ['a', 'b', 'mmm', 'zz']);
      assert.deepEqual(db.listComments({ limit: 2 }).map(row => row.commentId), ['a', 'b']);
    } finally {
      db.close();
    }
  });

  it('orders by the seeded key, then comment id', () => {
    const db = seeded();
    try {
      // seed 40: length 1 -> 40, length 2 -> 80, length 3 -> 20
      assert.deepEqual(db.listComments({ seed: 40 }).map(row => row.commentId), ['mmm', 'a', 'b', 'zz']);
      assert.deepEqual(db.listComments({ seed: 40, limit: 1 }).map(row => row.commentId), ['mmm']);
    } finally {
      db.close();
    }
  });

  it('maps stored columns to the comment shape', () => {
    const db = seeded();
    try {
      assert.deepEqual(db.listComments({ limit: 1 }), [{
        commentId: 'a',
        videoId: 'vid-1',
        publishedAt: '2024-07-02T10:00:00Z',
        likeCount: 3,
        totalReplyCount: 1,
        text: 'text of a',
      }]);
    } finally {
      db.close();
    }
  });
});

describe('CommentDatabase: persistence', () => {
  it('reads back comments after reopening the file', () => {
    const path = join(tempDir, 'nested', 'comments.db');
    const first = createCommentDatabase(path);
    first.saveComments([comment('c1')]);
    first.close();

    const second = createCommentDatabase(path);
    try {
      assert.equal(second.countComments(), 1);
    } finally {
      second.close();
    }
  });
});
