import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { Logger } from "pino";
import { z } from "zod";

import { calendarDateSchema } from "./config.js";
import { logRecoverableError } from "./error_utils.js";
import { AppError, ValidationError } from "./errors.js";
import { exportFileNames, formatVideoStats, serializeComments } from "./exporters.js";
import { buildHealthPayload, createHealthSnapshot, updateHealthOnFinish, updateHealthOnStart } from "./health.js";
import { logger as defaultLogger } from "./logger.js";
import { cacheLookupsTotal, httpRequestsTotal, httpResponseTimeSeconds, registry } from "./metrics.js";
import { TtlCache, analysisCacheKey, searchCacheKey } from "./ttl_cache.js";
import type {
  AnalysisFailure,
  AnalysisOptions,
  AnalysisResult,
  AnalysisSuccess,
  VideoSearchProvider,
  VideoSearchResult,
} from "./types.js";
import { resolveAnalysisOptions, type VideoAnalyzer } from "./video_analyzer.js";
import { extractVideoId } from "./video_id.js";

export interface AppDependencies {
  analyzer: Pick<VideoAnalyzer, "analyze">;
  search: VideoSearchProvider;
  analysisCacheTtlMs?: number;
  searchCacheTtlMs?: number;
  searchMaxResults?: number;
  logger?: Logger;
}

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const AnalyzeBodySchema = z.object({
  video: z.string().trim().min(1, "video is required"),
  fetchViews: z.boolean().optional(),
  fetchLikes: z.boolean().optional(),
  fetchComments: z.boolean().optional(),
  startDate: calendarDateSchema.nullish(),
  endDate: calendarDateSchema.nullish(),
});

const ExportQuerySchema = z.object({
  fetchViews: booleanFlag.optional(),
  fetchLikes: booleanFlag.optional(),
  fetchComments: booleanFlag.optional(),
  startDate: calendarDateSchema.optional(),
  endDate: calendarDateSchema.optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  maxResults: z.coerce.number().int().min(1).max(50).optional(),
});

const VideoParamsSchema = z.object({
  videoId: z.string(),
});

function parseOrThrow<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, value: unknown): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join(", ");
    throw new ValidationError(issues);
  }
  return parsed.data;
}

function requireVideoId(input: string): string {
  const videoId = extractVideoId(input);
  if (!videoId) {
    throw new ValidationError(`"${input}" is not a YouTube video id or URL`);
  }
  return videoId;
}

function failureStatusCode(failure: AnalysisFailure): number {
  return failure.kind === "video_not_found" ? 404 : 502;
}

function sendFailure(reply: FastifyReply, failure: AnalysisFailure): FastifyReply {
  return reply.code(failureStatusCode(failure)).send({ status: "error", message: failure.message, failure });
}

function clientErrorStatus(error: Error): number | null {
  if (!("statusCode" in error)) return null;
  const { statusCode } = error;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500 ? statusCode : null;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const log = deps.logger ?? defaultLogger;
  const health = createHealthSnapshot();
  const analysisCache = new TtlCache<AnalysisSuccess>(deps.analysisCacheTtlMs ?? 600_000);
  const searchCache = new TtlCache<VideoSearchResult[]>(deps.searchCacheTtlMs ?? 3_600_000);
  const searchMaxResults = deps.searchMaxResults ?? 10;

  async function runAnalysis(
    videoId: string,
    overrides: Partial<AnalysisOptions>,
  ): Promise<{ result: AnalysisResult; cached: boolean }> {
    const options = resolveAnalysisOptions(overrides);
    const cached = analysisCache.get(analysisCacheKey(videoId, options));
    cacheLookupsTotal.inc({ cache: "analysis", result: cached ? "hit" : "miss" });
    if (cached) {
      return { result: cached, cached: true };
    }

    updateHealthOnStart(health, videoId);
    let succeeded = false;
    try {
      const result = await deps.analyzer.analyze(videoId, options);
      if (result.status === "ok") {
        succeeded = true;
        analysisCache.set(analysisCacheKey(videoId, options), result);
      }
      return { result, cached: false };
    } finally {
      updateHealthOnFinish(health, videoId, succeeded);
    }
  }

  const server = Fastify({ logger: false });
  await server.register(cors, { origin: true });
  await server.register(helmet, { global: true });

  server.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions.url ?? "unmatched";
    const statusCode = reply.statusCode;
    httpRequestsTotal.inc({ route, method: request.method, status: String(statusCode) });
    httpResponseTimeSeconds.observe({ route, method: request.method }, reply.elapsedTime / 1000);

    const entry = { route, method: request.method, statusCode, totalRequestTimeMs: Math.round(reply.elapsedTime) };
    if (statusCode >= 500) {
      log.error(entry, "Request failed");
    } else if (statusCode >= 400) {
      log.warn(entry, "Request rejected");
    } else {
      log.info(entry, "Request completed");
    }
  });

  server.setErrorHandler((error: Error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logRecoverableError(log, error, { location: "http", metadata: { path: request.url } }, "Upstream request failed");
      }
      return reply.code(error.statusCode).send({ status: "error", message: error.message });
    }

    const statusCode = clientErrorStatus(error);
    if (statusCode !== null) {
      return reply.code(statusCode).send({ status: "error", message: error.message });
    }

    logRecoverableError(log, error, { location: "http", metadata: { path: request.url } }, "Unhandled request error");
    return reply.code(500).send({ status: "error", message: "Internal server error" });
  });

  server.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({ status: "error", message: "Route not found" });
  });

  server.get("/health", async () => buildHealthPayload(health, analysisCache.size));

  server.get("/metrics", async (_request, reply) => {
    const body = await registry.metrics();
    reply.header("Content-Type", registry.contentType);
    return reply.send(body);
  });

  server.get("/api/videos/search", async (request) => {
    const query = parseOrThrow(SearchQuerySchema, request.query);
    const maxResults = query.maxResults ?? searchMaxResults;

    const { value, hit } = await searchCache.getOrLoad(searchCacheKey(query.q, maxResults), () =>
      deps.search.searchVideos(query.q, maxResults),
    );
    cacheLookupsTotal.inc({ cache: "search", result: hit ? "hit" : "miss" });
    health.searchesTotal += 1;

    return { query: query.q, results: value, cached: hit };
  });

  server.post("/api/videos/analyze", async (request, reply) => {
    const body = parseOrThrow(AnalyzeBodySchema, request.body);
    const videoId = requireVideoId(body.video);

    const { result, cached } = await runAnalysis(videoId, {
      fetchViews: body.fetchViews,
      fetchLikes: body.fetchLikes,
      fetchComments: body.fetchComments,
      startDate: body.startDate ?? null,
      endDate: body.endDate ?? null,
    });

    if (result.status === "failed") {
      return sendFailure(reply, result.failure);
    }
    return reply.send({ ...result, cached });
  });

  server.get("/api/videos/:videoId/stats.txt", async (request, reply) => {
    const { videoId: rawVideoId } = parseOrThrow(VideoParamsSchema, request.params);
    const videoId = requireVideoId(rawVideoId);
    const query = parseOrThrow(ExportQuerySchema, request.query);

    const { result } = await runAnalysis(videoId, query);
    if (result.status === "failed") {
      return sendFailure(reply, result.failure);
    }

    return reply
      .type("text/plain; charset=utf-8")
      .header("Content-Disposition", `attachment; filename="${exportFileNames(videoId).stats}"`)
      .send(formatVideoStats(result.video));
  });

  server.get("/api/videos/:videoId/comments.json", async (request, reply) => {
    const { videoId: rawVideoId } = parseOrThrow(VideoParamsSchema, request.params);
    const videoId = requireVideoId(rawVideoId);
    const query = parseOrThrow(ExportQuerySchema, request.query);

    const { result } = await runAnalysis(videoId, query);
    if (result.status === "failed") {
      return sendFailure(reply, result.failure);
    }

    return reply
      .type("application/json; charset=utf-8")
      .header("Content-Disposition", `attachment; filename="${exportFileNames(videoId).comments}"`)
      .send(serializeComments(result.comments));
  });

  log.debug({ event: "app_initialized" }, "HTTP API initialised");

  return server;
}
