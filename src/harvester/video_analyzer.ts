import type { Logger } from "pino";

import { collectComments } from "./comment_collector.js";
import { filterCommentsByDate, parseCalendarDate } from "./date_filter.js";
import { normaliseError } from "./error_utils.js";
import { YouTubeApiError } from "./errors.js";
import { logger as defaultLogger } from "./logger.js";
import { analysesTotal } from "./metrics.js";
import {
  NOT_AVAILABLE,
  type AnalysisFailed,
  type AnalysisOptions,
  type AnalysisResult,
  type CommentThreadProvider,
  type RawVideo,
  type StatisticValue,
  type VideoDetailsProvider,
  type VideoPart,
  type VideoSummary,
} from "./types.js";

export interface VideoAnalyzerDependencies {
  videos: VideoDetailsProvider;
  comments: CommentThreadProvider;
  pageSize?: number;
  logger?: Logger;
}

export const DEFAULT_ANALYSIS_OPTIONS: Readonly<AnalysisOptions> = {
  fetchViews: true,
  fetchLikes: true,
  fetchComments: true,
  startDate: null,
  endDate: null,
};

export function resolveAnalysisOptions(overrides: Partial<AnalysisOptions> = {}): AnalysisOptions {
  return {
    fetchViews: overrides.fetchViews ?? DEFAULT_ANALYSIS_OPTIONS.fetchViews,
    fetchLikes: overrides.fetchLikes ?? DEFAULT_ANALYSIS_OPTIONS.fetchLikes,
    fetchComments: overrides.fetchComments ?? DEFAULT_ANALYSIS_OPTIONS.fetchComments,
    startDate: overrides.startDate || null,
    endDate: overrides.endDate || null,
  };
}

function readStatistic(requested: boolean, raw: string | undefined): StatisticValue | null {
  if (!requested) return null;
  if (raw === undefined || raw.trim().length === 0) return NOT_AVAILABLE;
  const value = Number(raw);
  return Number.isFinite(value) ? value : NOT_AVAILABLE;
}

export function summarizeVideo(videoId: string, video: RawVideo, options: AnalysisOptions): VideoSummary {
  return {
    videoId,
    title: video.snippet?.title ?? NOT_AVAILABLE,
    views: readStatistic(options.fetchViews, video.statistics?.viewCount),
    likes: readStatistic(options.fetchLikes, video.statistics?.likeCount),
  };
}

function failed(failure: AnalysisFailed["failure"]): AnalysisFailed {
  analysesTotal.inc({ outcome: failure.kind });
  return { status: "failed", failure };
}

/**
 * Resolves a video, then collects and date-filters its comments.
 *
 * Only the video lookup can fail the analysis as a whole. Comment pagination
 * problems come back as `collectionWarning` next to whatever was collected.
 */
export class VideoAnalyzer {
  private readonly logger: Logger;

  constructor(private readonly deps: VideoAnalyzerDependencies) {
    this.logger = deps.logger ?? defaultLogger;
  }

  async analyze(
    videoId: string,
    overrides: Partial<AnalysisOptions> = {},
    signal?: AbortSignal,
  ): Promise<AnalysisResult> {
    const options = resolveAnalysisOptions(overrides);
    if (options.startDate !== null) parseCalendarDate(options.startDate, "startDate");
    if (options.endDate !== null) parseCalendarDate(options.endDate, "endDate");

    const fetchStats = options.fetchViews || options.fetchLikes;
    const parts: VideoPart[] = fetchStats ? ["snippet", "statistics"] : ["snippet"];

    let rawVideo: RawVideo | null;
    try {
      rawVideo = await this.deps.videos.getVideo({ videoId, parts });
    } catch (error) {
      const details = error instanceof YouTubeApiError ? error : null;
      this.logger.error({ videoId, error: normaliseError(error) }, "Failed to fetch video details");
      return failed({
        kind: "api_error",
        videoId,
        message: normaliseError(error).message,
        status: details?.status ?? null,
        reason: details?.reason ?? null,
      });
    }

    if (!rawVideo) {
      this.logger.warn({ videoId }, "Video not found or access is restricted");
      return failed({
        kind: "video_not_found",
        videoId,
        message: `Video with ID '${videoId}' not found or access is restricted.`,
      });
    }

    const video = summarizeVideo(videoId, rawVideo, options);
    if (fetchStats && !rawVideo.statistics) {
      this.logger.warn({ videoId }, "Statistics requested but not returned; they may be disabled");
    }
    this.logger.info({ videoId, title: video.title, views: video.views, likes: video.likes }, "Fetched video details");

    if (!options.fetchComments) {
      analysesTotal.inc({ outcome: "ok" });
      return {
        status: "ok",
        video,
        comments: [],
        fetchedCount: 0,
        pagesFetched: 0,
        collectionWarning: null,
        dateWarnings: [],
      };
    }

    const collection = await collectComments(this.deps.comments, videoId, {
      pageSize: this.deps.pageSize,
      signal,
      logger: this.logger,
    });
    const filtered = filterCommentsByDate(collection.records, options.startDate, options.endDate, {
      logger: this.logger,
    });

    analysesTotal.inc({ outcome: collection.warning ? "partial" : "ok" });

    return {
      status: "ok",
      video,
      comments: filtered.records,
      fetchedCount: collection.records.length,
      pagesFetched: collection.pagesFetched,
      collectionWarning: collection.warning,
      dateWarnings: filtered.warnings,
    };
  }
}
