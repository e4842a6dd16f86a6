#!/usr/bin/env node
import { runHarvest, resolveInputs } from "./harvester/cli.js";
import { config } from "./harvester/config.js";
import { logRecoverableError } from "./harvester/error_utils.js";
import { logger } from "./harvester/logger.js";
import { VideoAnalyzer } from "./harvester/video_analyzer.js";
import { YouTubeClient } from "./harvester/youtube_client.js";

async function main(): Promise<void> {
  config.warnings.forEach((warning) => {
    logger.warn({ warning }, "Configuration warning");
  });

  if (!config.YOUTUBE_API_KEY) {
    logger.error("YOUTUBE_API_KEY is not set; export it before running the harvester");
    process.exitCode = 1;
    return;
  }

  const inputs = resolveInputs(process.argv.slice(2), config.YOUTUBE_VIDEO_ID);
  if (inputs.length === 0) {
    logger.error("No video given; pass video ids or URLs as arguments or set YOUTUBE_VIDEO_ID");
    process.exitCode = 1;
    return;
  }

  try {
    const client = new YouTubeClient({
      apiKey: config.YOUTUBE_API_KEY,
      baseUrl: config.YOUTUBE_API_BASE_URL,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      maxRetries: config.MAX_RETRIES,
      retryBackoffMs: config.RETRY_BACKOFF_MS,
    });
    const analyzer = new VideoAnalyzer({ videos: client, comments: client, pageSize: config.PAGE_SIZE });

    const reports = await runHarvest(inputs, {
      analyzer,
      outputDir: config.OUTPUT_DIR,
      concurrency: config.CONCURRENCY_LIMIT,
      analysis: {
        startDate: config.COMMENTS_START_DATE ?? null,
        endDate: config.COMMENTS_END_DATE ?? null,
      },
    });

    const failed = reports.filter((report) => report.status === "failed");
    logger.info({ videos: reports.length, failed: failed.length, outputDir: config.OUTPUT_DIR }, "Harvest finished");
    process.exitCode = failed.length === 0 ? 0 : 1;
  } catch (error) {
    logRecoverableError(logger, error, { location: "main" }, "Harvest crashed");
    process.exitCode = 1;
  }
}

void main();
