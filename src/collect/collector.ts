/**
 * Multi-video comment collection
 *
 * Each video: look up its snippet, page through comments, stamp the video's
 * publish date onto every comment (empty when the lookup failed). A video that fails is reported in its
 * result and the others carry on. Results come back in input order no
 * matter which video finishes first.
 */

import type { CommentOrder, VideoCollectionResult, VideoInfo } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { YouTubeClient } from '../api/youtube-client.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('collector');

export type ProgressCallback = (videoId: string, done: number, total: number) => void;

export interface CollectOptions {
  maxCommentsPerVideo?: number;
  order?: CommentOrder;
  /** Skip the videos.list lookup; videoPublishedAt stays empty */
  includeVideoInfo?: boolean;
}

export interface CollectorOptions {
  maxWorkers?: number;
  onProgress?: ProgressCallback;
}

type VideoSource = Pick<YouTubeClient, 'getVideoInfo' | 'fetchComments'>;

export class CommentCollector {
  private readonly client: VideoSource;
  private readonly maxWorkers: number;
  private readonly onProgress?: ProgressCallback;

  constructor(client: VideoSource, options: CollectorOptions = {}) {
    this.client = client;
    this.maxWorkers = Math.max(1, options.maxWorkers ?? DEFAULT_CONFIG.maxWorkers);
    this.onProgress = options.onProgress;
  }

  async collectVideo(videoId: string, options: CollectOptions = {}): Promise<VideoCollectionResult> {
    const result: VideoCollectionResult = { videoId, videoInfo: null, comments: [], error: null };

    if (options.includeVideoInfo ?? true) {
      result.videoInfo = await this.lookupVideo(videoId);
    }

    try {
      const comments = await this.client.fetchComments(videoId, {
        maxComments: options.maxCommentsPerVideo ?? DEFAULT_CONFIG.maxComments,
        order: options.order ?? DEFAULT_CONFIG.order,
      });

      const videoPublishedAt = result.videoInfo?.publishedAt ?? '';
      result.comments = comments.map(comment => ({ ...comment, videoPublishedAt }));
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      log.error(`Error collecting video ${videoId}`, { error: result.error });
    }

    return result;
  }

  /**
   * A failed lookup only costs the publish date; comments are still fetched.
   */
  private async lookupVideo(videoId: string): Promise<VideoInfo | null> {
    try {
      return await this.client.getVideoInfo(videoId);
    } catch (error) {
      log.warn(`Video lookup failed for ${videoId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Collect several videos with at most maxWorkers requests in flight.
   */
  async collect(videoIds: readonly string[], options: CollectOptions = {}): Promise<VideoCollectionResult[]> {
    const results: VideoCollectionResult[] = [];
    const total = videoIds.length;
    let next = 0;
    let done = 0;

    const worker = async (): Promise<void> => {
      while (next < videoIds.length) {
        const index = next++;
        const videoId = videoIds[index];
        if (videoId === undefined) return;

        results[index] = await this.collectVideo(videoId, options);
        done++;
        this.onProgress?.(videoId, done, total);
      }
    };

    const workers = Array.from({ length: Math.min(this.maxWorkers, total) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
