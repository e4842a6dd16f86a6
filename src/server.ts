import closeWithGrace from "close-with-grace";

import { buildApp } from "./harvester/app.js";
import { config } from "./harvester/config.js";
import { logRecoverableError } from "./harvester/error_utils.js";
import { logger } from "./harvester/logger.js";
import { VideoAnalyzer } from "./harvester/video_analyzer.js";
import { YouTubeClient } from "./harvester/youtube_client.js";

async function bootstrap(): Promise<void> {
  config.warnings.forEach((warning) => {
    logger.warn({ warning }, "Configuration warning");
  });

  if (!config.YOUTUBE_API_KEY) {
    logger.error("YOUTUBE_API_KEY is not set; the API cannot reach YouTube without it");
    process.exit(1);
  }

  try {
    const client = new YouTubeClient({
      apiKey: config.YOUTUBE_API_KEY,
      baseUrl: config.YOUTUBE_API_BASE_URL,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      maxRetries: config.MAX_RETRIES,
      retryBackoffMs: config.RETRY_BACKOFF_MS,
    });

    const app = await buildApp({
      analyzer: new VideoAnalyzer({ videos: client, comments: client, pageSize: config.PAGE_SIZE }),
      search: client,
      analysisCacheTtlMs: config.ANALYSIS_CACHE_TTL_SECONDS * 1000,
      searchCacheTtlMs: config.SEARCH_CACHE_TTL_SECONDS * 1000,
      searchMaxResults: config.SEARCH_MAX_RESULTS,
    });

    await app.listen({ port: config.HTTP_PORT, host: config.HTTP_HOST });
    logger.info({ port: config.HTTP_PORT, host: config.HTTP_HOST }, "Comment harvester API listening");

    closeWithGrace({ delay: 500 }, async ({ signal, err }: { signal?: string | number; err?: unknown; manual?: boolean }) => {
      if (err) {
        logger.error({ err, signal }, "Graceful shutdown due to error");
      } else {
        logger.info({ signal }, "Graceful shutdown initiated");
      }
      await app.close();
    });
  } catch (error) {
    logRecoverableError(logger, error, { location: "bootstrap" }, "Failed to start comment harvester API");
    process.exit(1);
  }
}

void bootstrap();
