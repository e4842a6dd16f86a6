import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/harvester/config.js";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      YOUTUBE_API_BASE_URL: "https://www.googleapis.com/youtube/v3",
      OUTPUT_DIR: "youtube_output_data",
      PAGE_SIZE: 100,
      MAX_RETRIES: 3,
      RETRY_BACKOFF_MS: 500,
      REQUEST_TIMEOUT_MS: 10_000,
      CONCURRENCY_LIMIT: 3,
      HTTP_HOST: "0.0.0.0",
      HTTP_PORT: 9000,
      ANALYSIS_CACHE_TTL_SECONDS: 600,
      SEARCH_CACHE_TTL_SECONDS: 3600,
      SEARCH_MAX_RESULTS: 10,
      LOG_LEVEL: "info",
      NODE_ENV: "development",
    });
    expect(config.YOUTUBE_API_KEY).toBeUndefined();
    expect(config.warnings).toEqual([]);
  });

  it("coerces numeric values and normalises the log level", () => {
    const config = loadConfig({
      YOUTUBE_API_KEY: "test-key",
      PAGE_SIZE: "50",
      HTTP_PORT: "8080",
      LOG_LEVEL: "DEBUG",
      COMMENTS_START_DATE: "2024-01-01",
    });

    expect(config.YOUTUBE_API_KEY).toBe("test-key");
    expect(config.PAGE_SIZE).toBe(50);
    expect(config.HTTP_PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.COMMENTS_START_DATE).toBe("2024-01-01");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OUTPUT_DIR: "   ", COMMENTS_END_DATE: "" });

    expect(config.OUTPUT_DIR).toBe("youtube_output_data");
    expect(config.COMMENTS_END_DATE).toBeUndefined();
    expect(config.warnings).toEqual([]);
  });

  it("falls back to the default and warns for each invalid value", () => {
    const config = loadConfig({ PAGE_SIZE: "500", COMMENTS_END_DATE: "31/12/2024", OUTPUT_DIR: "exports" });

    expect(config.PAGE_SIZE).toBe(100);
    expect(config.COMMENTS_END_DATE).toBeUndefined();
    expect(config.OUTPUT_DIR).toBe("exports");
    expect(config.warnings).toEqual([
      'COMMENTS_END_DATE is invalid (expected a YYYY-MM-DD date; received "31/12/2024"). Falling back to default.',
      'PAGE_SIZE is invalid (Number must be less than or equal to 100; received "500"). Falling back to default.',
    ]);
  });
});
