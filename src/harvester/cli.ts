import pLimit from "p-limit";
import type { Logger } from "pino";

import { logRecoverableError, normaliseError } from "./error_utils.js";
import { writeVideoExport, type ExportPaths } from "./exporters.js";
import { logger as defaultLogger } from "./logger.js";
import type { AnalysisOptions, CollectionWarning } from "./types.js";
import { measureAsync } from "./utils.js";
import type { VideoAnalyzer } from "./video_analyzer.js";
import { extractVideoId } from "./video_id.js";

export interface HarvestOptions {
  analyzer: Pick<VideoAnalyzer, "analyze">;
  outputDir: string;
  concurrency: number;
  analysis?: Partial<AnalysisOptions>;
  logger?: Logger;
}

export type HarvestReport =
  | {
      status: "ok";
      input: string;
      videoId: string;
      title: string;
      fetchedCount: number;
      exportedCount: number;
      warning: CollectionWarning | null;
      dateWarnings: number;
      files: ExportPaths;
      durationMs: number;
    }
  | {
      status: "failed";
      input: string;
      videoId: string | null;
      message: string;
    };

/**
 * Positional arguments win; otherwise the comma-separated fallback from the
 * environment. Dash-prefixed arguments are flags unless they are video ids.
 */
export function resolveInputs(args: readonly string[], fallback?: string): string[] {
  const fromArgs = args
    .map((arg) => arg.trim())
    .filter((arg) => arg.length > 0 && (!arg.startsWith("-") || extractVideoId(arg) !== null));
  if (fromArgs.length > 0) {
    return fromArgs;
  }
  return (fallback ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

async function harvestVideo(input: string, options: HarvestOptions, log: Logger): Promise<HarvestReport> {
  const videoId = extractVideoId(input);
  if (!videoId) {
    log.error({ input }, "Not a YouTube video id or URL");
    return { status: "failed", input, videoId: null, message: `"${input}" is not a YouTube video id or URL` };
  }

  try {
    const { result, durationMs } = await measureAsync(() => options.analyzer.analyze(videoId, options.analysis));

    if (result.status === "failed") {
      log.error({ videoId, failure: result.failure }, "Video analysis failed");
      return { status: "failed", input, videoId, message: result.failure.message };
    }

    if (result.collectionWarning) {
      log.warn({ videoId, warning: result.collectionWarning }, "Comments collected with warnings");
    }

    const files = await writeVideoExport(options.outputDir, result.video, result.comments);
    log.info(
      {
        videoId,
        title: result.video.title,
        fetched: result.fetchedCount,
        exported: result.comments.length,
        statsPath: files.statsPath,
        commentsPath: files.commentsPath,
      },
      "Video exported",
    );

    return {
      status: "ok",
      input,
      videoId,
      title: result.video.title,
      fetchedCount: result.fetchedCount,
      exportedCount: result.comments.length,
      warning: result.collectionWarning,
      dateWarnings: result.dateWarnings.length,
      files,
      durationMs,
    };
  } catch (error) {
    logRecoverableError(log, error, { location: "harvestVideo", videoId }, "Failed to harvest video");
    return { status: "failed", input, videoId, message: normaliseError(error).message };
  }
}

/** Harvests every input with bounded concurrency; reports come back in input order. */
export async function runHarvest(inputs: readonly string[], options: HarvestOptions): Promise<HarvestReport[]> {
  const log = options.logger ?? defaultLogger;
  const limit = pLimit(Math.max(1, options.concurrency));
  return Promise.all(inputs.map((input) => limit(() => harvestVideo(input, options, log))));
}
