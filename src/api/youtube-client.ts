/**
 * YouTube Data API v3 client
 *
 * Two read-only calls: video snippet lookup and paginated top-level comment
 * threads. Responses are validated with zod before anything downstream sees
 * them; failures surface as YouTubeApiError.
 */

import { z } from 'zod';
import type { CommentOrder, CommentRecord, VideoInfo } from '../types/index.js';
import { YouTubeApiError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';

/** API cap for commentThreads.list maxResults */
export const MAX_PAGE_SIZE = 100;

const log = createLogger('youtube');

// =============================================================================
// Response Schemas
// =============================================================================

const VideoListResponse = z.object({
  items: z.array(z.object({
    id: z.string(),
    snippet: z.object({
      publishedAt: z.string().default(''),
      title: z.string().optional(),
      channelTitle: z.string().optional(),
    }),
  })).default([]),
});

const CommentSnippet = z.object({
  textDisplay: z.string().default(''),
  textOriginal: z.string().optional(),
  publishedAt: z.string().default(''),
  updatedAt: z.string().default(''),
  likeCount: z.number().int().default(0),
  authorChannelId: z.object({ value: z.string() }).optional(),
});

const CommentThreadListResponse = z.object({
  nextPageToken: z.string().optional(),
  items: z.array(z.object({
    id: z.string(),
    snippet: z.object({
      totalReplyCount: z.number().int().default(0),
      topLevelComment: z.object({
        snippet: CommentSnippet,
      }),
    }),
  })).default([]),
});

const ApiErrorBody = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
  }),
});

// =============================================================================
// Client
// =============================================================================

export type FetchLike = (url: string) => Promise<Response>;

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetch?: FetchLike;
}

export interface FetchCommentsOptions {
  maxComments?: number;
  order?: CommentOrder;
}

export class YouTubeClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? YOUTUBE_API_BASE;
    this.fetchImpl = options.fetch ?? ((url: string) => fetch(url));
  }

  /**
   * Snippet for one video. A video missing from the response (deleted,
   * private) yields an empty publishedAt rather than an error.
   */
  async getVideoInfo(videoId: string): Promise<VideoInfo> {
    const body = await this.request('videos', { part: 'snippet', id: videoId });
    const parsed = parseResponse('videos', VideoListResponse, body);

    const item = parsed.items[0];
    if (!item) {
      log.warn(`Video not found: ${videoId}`);
      return { videoId, publishedAt: '' };
    }

    return {
      videoId,
      publishedAt: item.snippet.publishedAt,
      title: item.snippet.title,
      channel: item.snippet.channelTitle,
    };
  }

  /**
   * Top-level comments, following nextPageToken until the thread list is
   * exhausted or maxComments is reached. When a later page fails, the
   * comments already fetched are returned. videoPublishedAt is left empty;
   * the collector fills it from getVideoInfo.
   */
  async fetchComments(videoId: string, options: FetchCommentsOptions = {}): Promise<CommentRecord[]> {
    const maxComments = options.maxComments ?? 500;
    const order = options.order ?? 'time';
    const comments: CommentRecord[] = [];
    let pageToken: string | undefined;

    while (comments.length < maxComments) {
      let page: z.output<typeof CommentThreadListResponse>;
      try {
        const body = await this.request('commentThreads', {
          part: 'snippet',
          videoId,
          maxResults: String(Math.min(MAX_PAGE_SIZE, maxComments - comments.length)),
          order,
          textFormat: 'plainText',
          ...(pageToken ? { pageToken } : {}),
        });
        page = parseResponse('commentThreads', CommentThreadListResponse, body);
      } catch (error) {
        // nothing collected yet: surface the failure
        if (comments.length === 0 || !(error instanceof YouTubeApiError)) throw error;
        log.warn(`Stopped paging ${videoId} after ${comments.length} comments`, { error: error.message });
        break;
      }

      for (const item of page.items) {
        const snippet = item.snippet.topLevelComment.snippet;
        comments.push({
          commentId: item.id,
          videoId,
          videoPublishedAt: '',
          publishedAt: snippet.publishedAt,
          updatedAt: snippet.updatedAt,
          likeCount: snippet.likeCount,
          totalReplyCount: item.snippet.totalReplyCount,
          text: snippet.textDisplay,
          authorChannelId: snippet.authorChannelId?.value,
        });
        if (comments.length >= maxComments) break;
      }

      log.debug(`Fetched page for ${videoId}`, { items: page.items.length, total: comments.length });

      pageToken = page.nextPageToken;
      if (!pageToken) break;
    }

    return comments;
  }

  buildUrl(endpoint: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.apiKey);
    return url.toString();
  }

  private async request(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new YouTubeApiError(endpoint, null, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const text = await response.text();
    const body = parseJson(text);

    if (!response.ok) {
      const apiError = ApiErrorBody.safeParse(body);
      const message = apiError.success ? apiError.data.error.message : `HTTP ${response.status}`;
      throw new YouTubeApiError(endpoint, response.status, message);
    }

    if (body === undefined) {
      throw new YouTubeApiError(endpoint, response.status, 'Response is not valid JSON');
    }
    return body;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseResponse<T extends z.ZodTypeAny>(endpoint: string, schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new YouTubeApiError(endpoint, null, `Unexpected response shape${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}
