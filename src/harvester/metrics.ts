import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "comment-harvester" });

collectDefaultMetrics({ register: registry });

export const commentPagesFetchedTotal = new Counter({
  name: "harvester_comment_pages_fetched_total",
  help: "Total number of comment-thread pages fetched from the provider",
  registers: [registry],
});

export const commentsCollectedTotal = new Counter({
  name: "harvester_comments_collected_total",
  help: "Total number of normalized comment records collected",
  registers: [registry],
});

export const collectionWarningsTotal = new Counter({
  name: "harvester_collection_warnings_total",
  help: "Comment paginations that stopped early, by cause",
  labelNames: ["kind"],
  registers: [registry],
});

export const pageFetchDurationSeconds = new Histogram({
  name: "harvester_page_fetch_duration_seconds",
  help: "Latency of a single comment-thread page request",
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const dateParseWarningsTotal = new Counter({
  name: "harvester_date_parse_warnings_total",
  help: "Comment records dropped by the date filter because published_at could not be parsed",
  registers: [registry],
});

export const analysesTotal = new Counter({
  name: "harvester_analyses_total",
  help: "Video analyses run, by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

export const cacheLookupsTotal = new Counter({
  name: "harvester_cache_lookups_total",
  help: "Result cache lookups, by cache and hit/miss",
  labelNames: ["cache", "result"],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: "harvester_http_requests_total",
  help: "Total number of HTTP API requests",
  labelNames: ["route", "method", "status"],
  registers: [registry],
});

export const httpResponseTimeSeconds = new Histogram({
  name: "harvester_http_response_time_seconds",
  help: "Histogram of HTTP API response times",
  labelNames: ["route", "method"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});
