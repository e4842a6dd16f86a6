import type { Logger } from "pino";

import { normalizeCommentThread } from "./comment_normalizer.js";
import { normaliseError } from "./error_utils.js";
import { YouTubeApiError } from "./errors.js";
import { logger as defaultLogger } from "./logger.js";
import {
  collectionWarningsTotal,
  commentPagesFetchedTotal,
  commentsCollectedTotal,
  pageFetchDurationSeconds,
} from "./metrics.js";
import {
  MAX_PAGE_SIZE,
  type CollectionWarning,
  type CommentRecord,
  type CommentThreadProvider,
} from "./types.js";

export interface CollectorOptions {
  /** Items requested per page, clamped to 1..100. */
  pageSize?: number;
  /** Checked before every page request. */
  signal?: AbortSignal;
  logger?: Logger;
}

export type CommentPageEvent =
  | { kind: "page"; pageNumber: number; records: CommentRecord[]; nextPageToken: string | null }
  | { kind: "truncated"; warning: CollectionWarning };

export interface CollectionResult {
  records: CommentRecord[];
  pagesFetched: number;
  warning: CollectionWarning | null;
}

type PageFetchOutcome =
  | { ok: true; records: CommentRecord[]; nextPageToken: string | null }
  | { ok: false; warning: CollectionWarning };

export function clampPageSize(pageSize: number | undefined): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) {
    return MAX_PAGE_SIZE;
  }
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)));
}

export function toCollectionWarning(error: unknown, pageNumber: number): CollectionWarning {
  if (error instanceof YouTubeApiError && error.isCommentsDisabled) {
    return { kind: "comments_disabled", pageNumber, message: "Comments are disabled for this video." };
  }

  if (error instanceof YouTubeApiError) {
    return {
      kind: "provider_error",
      pageNumber,
      message: error.message,
      status: error.status,
      reason: error.reason,
    };
  }

  return {
    kind: "provider_error",
    pageNumber,
    message: normaliseError(error).message,
    status: null,
    reason: null,
  };
}

/**
 * Lazy, finite sequence of comment-thread pages for one video.
 *
 * Every iteration starts again from the first page. Pages are requested one
 * at a time, only when the consumer asks for the next one. A provider error
 * or an item that cannot be normalized ends the sequence with a single
 * `truncated` event instead of a rejection.
 */
export class CommentPageStream implements AsyncIterable<CommentPageEvent> {
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: CommentThreadProvider,
    private readonly videoId: string,
    private readonly options: CollectorOptions = {},
  ) {
    this.pageSize = clampPageSize(options.pageSize);
    this.logger = options.logger ?? defaultLogger;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<CommentPageEvent, void, undefined> {
    let pageToken: string | null = null;
    let pageNumber = 0;

    while (true) {
      pageNumber += 1;

      if (this.options.signal?.aborted) {
        const warning: CollectionWarning = {
          kind: "cancelled",
          pageNumber,
          message: "Comment collection was cancelled by the caller.",
        };
        collectionWarningsTotal.inc({ kind: warning.kind });
        this.logger.info({ videoId: this.videoId, pageNumber }, "Comment pagination cancelled");
        yield { kind: "truncated", warning };
        return;
      }

      const outcome = await this.fetchPage(pageToken, pageNumber);
      if (!outcome.ok) {
        yield { kind: "truncated", warning: outcome.warning };
        return;
      }

      const { records, nextPageToken } = outcome;

      commentPagesFetchedTotal.inc();
      commentsCollectedTotal.inc(records.length);
      this.logger.debug(
        { videoId: this.videoId, pageNumber, count: records.length, hasNextPage: nextPageToken !== null },
        "Fetched comment page",
      );

      yield { kind: "page", pageNumber, records, nextPageToken };

      if (nextPageToken === null) {
        return;
      }
      pageToken = nextPageToken;
    }
  }

  private async fetchPage(pageToken: string | null, pageNumber: number): Promise<PageFetchOutcome> {
    const stopTimer = pageFetchDurationSeconds.startTimer();
    try {
      const page = await this.provider.listCommentThreads({
        videoId: this.videoId,
        pageToken,
        maxResults: this.pageSize,
        textFormat: "plainText",
      });
      return {
        ok: true,
        records: page.items.map((item) => normalizeCommentThread(item)),
        nextPageToken: page.nextPageToken ? page.nextPageToken : null,
      };
    } catch (error) {
      const warning = toCollectionWarning(error, pageNumber);
      collectionWarningsTotal.inc({ kind: warning.kind });
      this.logger.warn({ videoId: this.videoId, pageNumber, warning }, "Comment pagination stopped early");
      return { ok: false, warning };
    } finally {
      stopTimer();
    }
  }
}

export async function collectComments(
  provider: CommentThreadProvider,
  videoId: string,
  options: CollectorOptions = {},
): Promise<CollectionResult> {
  const records: CommentRecord[] = [];
  let pagesFetched = 0;
  let warning: CollectionWarning | null = null;

  for await (const event of new CommentPageStream(provider, videoId, options)) {
    if (event.kind === "page") {
      records.push(...event.records);
      pagesFetched += 1;
    } else {
      warning = event.warning;
    }
  }

  (options.logger ?? defaultLogger).info(
    { videoId, pagesFetched, count: records.length, warning: warning?.kind ?? null },
    "Finished collecting comments",
  );

  return { records, pagesFetched, warning };
}
