import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";

import { normaliseError } from "./error_utils.js";
import { YouTubeApiError } from "./errors.js";
import { logger as defaultLogger } from "./logger.js";
import type {
  CommentThreadPage,
  CommentThreadPageRequest,
  CommentThreadProvider,
  RawCommentThread,
  RawVideo,
  VideoDetailsProvider,
  VideoDetailsRequest,
  VideoSearchProvider,
  VideoSearchResult,
} from "./types.js";
import { exponentialBackoff } from "./utils.js";

export const DEFAULT_YOUTUBE_API_BASE_URL = "https://www.googleapis.com/youtube/v3";

interface GoogleErrorEnvelope {
  error?: {
    code?: number;
    message?: string;
    errors?: Array<{ reason?: string; message?: string }>;
  };
}

interface VideoListResponse {
  items?: RawVideo[];
}

interface CommentThreadListResponse {
  items?: RawCommentThread[];
  nextPageToken?: string;
}

interface SearchListResponse {
  items?: Array<{
    id?: { videoId?: string };
    snippet?: {
      title?: string;
      channelTitle?: string;
      thumbnails?: { default?: { url?: string } };
    };
  }>;
}

type QueryParams = Record<string, string | number | undefined>;

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export function toYouTubeApiError(error: unknown): YouTubeApiError {
  if (error instanceof YouTubeApiError) {
    return error;
  }

  if (axios.isAxiosError<GoogleErrorEnvelope>(error)) {
    const status = error.response?.status;
    const envelope = error.response?.data?.error;
    const reason = envelope?.errors?.[0]?.reason;
    const message = envelope?.message ?? error.message;
    return new YouTubeApiError(message, { status, reason, cause: error });
  }

  return new YouTubeApiError(normaliseError(error).message, { cause: error });
}

/** Thin client for the three YouTube Data API v3 listings the harvester needs. */
export class YouTubeClient implements VideoDetailsProvider, CommentThreadProvider, VideoSearchProvider {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly options: YouTubeClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_YOUTUBE_API_BASE_URL,
        timeout: options.timeoutMs ?? 10_000,
      });
    this.logger = options.logger ?? defaultLogger;
  }

  async getVideo({ videoId, parts }: VideoDetailsRequest): Promise<RawVideo | null> {
    const data = await this.request<VideoListResponse>(
      "/videos",
      { part: parts.join(","), id: videoId },
      `videos.list(${videoId})`,
    );
    return data.items?.[0] ?? null;
  }

  async listCommentThreads(request: CommentThreadPageRequest): Promise<CommentThreadPage> {
    const data = await this.request<CommentThreadListResponse>(
      "/commentThreads",
      {
        part: "snippet",
        videoId: request.videoId,
        maxResults: request.maxResults,
        textFormat: request.textFormat,
        pageToken: request.pageToken ?? undefined,
      },
      `commentThreads.list(${request.videoId})`,
    );

    return {
      items: data.items ?? [],
      nextPageToken: data.nextPageToken || undefined,
    };
  }

  async searchVideos(query: string, maxResults: number): Promise<VideoSearchResult[]> {
    const data = await this.request<SearchListResponse>(
      "/search",
      { part: "snippet", q: query, type: "video", maxResults },
      `search.list(${query})`,
    );

    const results: VideoSearchResult[] = [];
    for (const item of data.items ?? []) {
      const id = item.id?.videoId;
      if (!id) continue;
      results.push({
        id,
        title: item.snippet?.title ?? "",
        channel: item.snippet?.channelTitle ?? null,
        thumbnail: item.snippet?.thumbnails?.default?.url ?? null,
      });
    }
    return results;
  }

  private async request<T>(path: string, params: QueryParams, label: string): Promise<T> {
    return exponentialBackoff(
      async () => {
        try {
          const response = await this.http.get<T>(path, { params: { ...params, key: this.options.apiKey } });
          return response.data;
        } catch (error) {
          throw toYouTubeApiError(error);
        }
      },
      {
        retries: this.options.maxRetries ?? 3,
        baseDelayMs: this.options.retryBackoffMs ?? 500,
        shouldRetry: (error) => error instanceof YouTubeApiError && error.isRetryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            { request: label, attempt, delayMs, error: normaliseError(error).message },
            "YouTube API request failed; retrying",
          );
        },
      },
    );
  }
}
