#!/usr/bin/env node
/**
 * comment-coder CLI
 *
 * Usage:
 *   comment-coder collect --video <id> [--video <id>...] [--csv <path>] [--db <path>]
 *                         [--max-comments N] [--order time|relevance]
 *   comment-coder code --out <path> [--db <path>] [--limit N] [--seed N] [--no-debug]
 *   comment-coder label <text>       Label one comment (or read it from piped stdin)
 *   comment-coder stats [--db <path>] Stored comments per video
 */

import minimist from 'minimist';
import type { AppConfig, CommentOrder, CommentRecord } from './types/index.js';
import { YouTubeClient } from './api/youtube-client.js';
import { CommentCollector } from './collect/collector.js';
import { generateCodingSheet } from './coding/coding-sheet.js';
import { loadConfig, loadEnvFile } from './config.js';
import { ConfigError } from './errors.js';
import { createLabeler } from './labeling/labeler.js';
import { createCommentDatabase, type CommentDatabase } from './storage/database.js';
import { writeCommentsCsv } from './storage/csv.js';
import { setLogLevel } from './utils/logger.js';
import { readTextInput } from './utils/stdin.js';

type Args = minimist.ParsedArgs;

async function main(argv: string[]): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const args = minimist(argv, {
    string: ['video', 'csv', 'db', 'out', 'order', 'max-comments', 'limit', 'seed'],
    boolean: ['debug', 'help'],
    default: { debug: config.includeDebug },
    alias: { h: 'help' },
  });
  const command = args._[0];

  if (args.help || command === undefined || command === 'help') {
    printHelp();
    return;
  }

  switch (command) {
    case 'collect':
      await handleCollect(config, args);
      break;

    case 'code':
      handleCode(config, args);
      break;

    case 'label':
      await handleLabel(args);
      break;

    case 'stats':
      handleStats(config, args);
      break;

    default:
      printHelp();
      throw new ConfigError(`Unknown command: ${command}`);
  }
}

// ---------------------------------------------------------------------------
// collect
// ---------------------------------------------------------------------------

async function handleCollect(config: AppConfig, args: Args): Promise<void> {
  const videoIds = stringList(args.video);
  if (videoIds.length === 0) {
    throw new ConfigError('At least one --video is required');
  }

  const csvPath = optionalString(args.csv);
  const dbPath = optionalString(args.db);
  if (!csvPath && !dbPath) {
    throw new ConfigError('At least one output format (--csv or --db) must be specified');
  }
  if (!config.youtubeApiKey) {
    throw new ConfigError('YOUTUBE_API_KEY environment variable is not set');
  }

  const maxComments = positiveInt(args['max-comments'], '--max-comments') ?? config.maxComments;
  const order = parseOrder(args.order) ?? config.order;

  const collector = new CommentCollector(new YouTubeClient({ apiKey: config.youtubeApiKey }), {
    maxWorkers: config.maxWorkers,
    onProgress: (videoId, done, total) => console.error(`  [${done}/${total}] ${videoId}`),
  });
  const results = await collector.collect(videoIds, { maxCommentsPerVideo: maxComments, order });

  const db = dbPath ? createCommentDatabase(dbPath) : null;
  const allComments: CommentRecord[] = [];
  try {
    for (const result of results) {
      console.log(`\nProcessing video: ${result.videoId}`);
      if (result.error) {
        console.log(`  Error: ${result.error}`);
      }
      allComments.push(...result.comments);
      console.log(`  Fetched: ${result.comments.length} comments`);

      if (db) {
        if (result.videoInfo) db.saveVideo(result.videoInfo);
        const saved = db.saveComments(result.comments);
        console.log(`  Saved: ${saved.inserted} new comments`);
        console.log(`  Skipped: ${saved.skipped} duplicate comments`);
      }
    }
  } finally {
    db?.close();
  }

  if (csvPath && writeCommentsCsv(csvPath, allComments)) {
    console.log(`CSV saved to: ${csvPath}`);
  }
  console.log(`\nTotal comments collected: ${allComments.length}`);
  if (dbPath) {
    console.log(`Database saved to: ${dbPath}`);
  }
}

// ---------------------------------------------------------------------------
// code
// ---------------------------------------------------------------------------

function handleCode(config: AppConfig, args: Args): void {
  const outputPath = optionalString(args.out);
  if (!outputPath) {
    throw new ConfigError('--out <path> is required');
  }

  const db = openDatabase(config, args);
  try {
    const result = generateCodingSheet(db, createLabeler(), {
      outputPath,
      limit: positiveInt(args.limit, '--limit'),
      seed: integer(args.seed, '--seed'),
      includeDebug: args.debug === true,
    });
    console.log(`Generated coding sheet with ${result.written} comments: ${result.outputPath}`);
    for (const skipped of result.skipped) {
      console.log(`  Skipped ${skipped.commentId}: ${skipped.reason}`);
    }
  } finally {
    db.close();
  }
}

// ---------------------------------------------------------------------------
// label
// ---------------------------------------------------------------------------

async function handleLabel(args: Args): Promise<void> {
  const text = await readTextInput(args._.slice(1).map(String), process.stdin);
  if (text === null) {
    printHelp();
    return;
  }
  const result = createLabeler().classify(text);
  console.log(JSON.stringify(result, null, 2));
}

// ---------------------------------------------------------------------------
// stats
// ---------------------------------------------------------------------------

function handleStats(config: AppConfig, args: Args): void {
  const db = openDatabase(config, args);
  try {
    const counts = db.countByVideo();
    for (const video of counts) {
      console.log(`${video.videoId}\t${video.publishedAt ?? ''}\t${video.comments}`);
    }
    console.log(`Total: ${db.countComments()} comments in ${counts.length} videos`);
  } finally {
    db.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function openDatabase(config: AppConfig, args: Args): CommentDatabase {
  return createCommentDatabase(optionalString(args.db) ?? config.dbPath);
}

function stringList(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
}

function optionalString(value: unknown): string | undefined {
  return stringList(value).at(-1);
}

function integer(value: unknown, flag: string): number | undefined {
  const raw = optionalString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} expects an integer, got "${raw}"`);
  }
  return parsed;
}

function positiveInt(value: unknown, flag: string): number | undefined {
  const parsed = integer(value, flag);
  if (parsed !== undefined && parsed <= 0) {
    throw new ConfigError(`${flag} must be greater than 0`);
  }
  return parsed;
}

function parseOrder(value: unknown): CommentOrder | undefined {
  const raw = optionalString(value);
  if (raw === undefined) return undefined;
  if (raw === 'time' || raw === 'relevance') return raw;
  throw new ConfigError(`--order must be "time" or "relevance", got "${raw}"`);
}

function printHelp(): void {
  console.log(`
comment-coder - collect YouTube comments and dictionary-code them

Commands:
  collect --video <id> [--video <id>...]   Fetch comments (needs YOUTUBE_API_KEY)
          [--csv <path>] [--db <path>]     At least one output is required
          [--max-comments N]               Per video (default: 500)
          [--order time|relevance]         (default: time)
  code --out <path> [--db <path>]          Write a coding sheet from stored comments
       [--limit N] [--seed N] [--no-debug]
  label <text>                             Print labels, rules and keywords as JSON
                                           (text may be piped on stdin instead)
  stats [--db <path>]                      Stored comments per video
  help                                     Show this help

Environment:
  YOUTUBE_API_KEY, COMMENT_CODER_DB, COMMENT_CODER_MAX_COMMENTS,
  COMMENT_CODER_MAX_WORKERS, COMMENT_CODER_DEBUG_COLUMNS, COMMENT_CODER_LOG_LEVEL
  (read from the environment or ./.env)
`);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
