import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolveInputs, runHarvest } from "../src/harvester/cli.js";
import { VideoAnalyzer } from "../src/harvester/video_analyzer.js";
import { FakeCommentProvider, FakeVideoProvider, SAMPLE_VIDEO, VIDEO_ID, makePages } from "./fakes.js";

describe("resolveInputs", () => {
  it("prefers positional arguments and skips flags", () => {
    expect(resolveInputs(["--verbose", " abcDEF12345 ", "https://youtu.be/zyxWVU98765"], "ignored")).toEqual([
      "abcDEF12345",
      "https://youtu.be/zyxWVU98765",
    ]);
  });

  it("keeps video ids that begin with a dash", () => {
    expect(resolveInputs(["-abcDEF1234", "--dry-run", "-v"], "zyxWVU98765")).toEqual(["-abcDEF1234"]);
  });

  it("splits the comma-separated fallback", () => {
    expect(resolveInputs([], "abcDEF12345, zyxWVU98765,,")).toEqual(["abcDEF12345", "zyxWVU98765"]);
  });

  it("returns nothing without arguments or fallback", () => {
    expect(resolveInputs([])).toEqual([]);
  });
});

describe("runHarvest", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), "harvester-cli-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("exports every video and reports in input order", async () => {
    const analyzer = new VideoAnalyzer({
      videos: new FakeVideoProvider({ [VIDEO_ID]: SAMPLE_VIDEO }),
      comments: new FakeCommentProvider(makePages([2, 1])),
    });

    const reports = await runHarvest(["not a video", `https://www.youtube.com/watch?v=${VIDEO_ID}`, "zyxWVU98765"], {
      analyzer,
      outputDir,
      concurrency: 2,
    });

    expect(reports.map((report) => report.status)).toEqual(["failed", "ok", "failed"]);
    expect(reports[0]).toEqual({
      status: "failed",
      input: "not a video",
      videoId: null,
      message: '"not a video" is not a YouTube video id or URL',
    });
    expect(reports[2]).toEqual({
      status: "failed",
      input: "zyxWVU98765",
      videoId: "zyxWVU98765",
      message: "Video with ID 'zyxWVU98765' not found or access is restricted.",
    });

    const exported = reports[1];
    expect(exported).toMatchObject({
      status: "ok",
      videoId: VIDEO_ID,
      title: "Launch Trailer",
      fetchedCount: 3,
      exportedCount: 3,
      warning: null,
      dateWarnings: 0,
      files: {
        statsPath: path.join(outputDir, `${VIDEO_ID}_stats.txt`),
        commentsPath: path.join(outputDir, `${VIDEO_ID}_comments.json`),
      },
    });
    expect(await readFile(path.join(outputDir, `${VIDEO_ID}_stats.txt`), "utf-8")).toBe(
      `Video Title: Launch Trailer\nVideo ID: ${VIDEO_ID}\nViews: 1500\nLikes: 120\n`,
    );
    const comments: unknown = JSON.parse(await readFile(path.join(outputDir, `${VIDEO_ID}_comments.json`), "utf-8"));
    expect(comments).toHaveLength(3);
  });

  it("applies the shared analysis options to every video", async () => {
    const analyzer = new VideoAnalyzer({
      videos: new FakeVideoProvider({ [VIDEO_ID]: SAMPLE_VIDEO }),
      comments: new FakeCommentProvider(makePages([3], (index) => (index === 0 ? "2023-05-01T00:00:00Z" : "2024-05-01T00:00:00Z"))),
    });

    const [report] = await runHarvest([VIDEO_ID], {
      analyzer,
      outputDir,
      concurrency: 1,
      analysis: { fetchLikes: false, startDate: "2024-01-01" },
    });

    expect(report).toMatchObject({ status: "ok", fetchedCount: 3, exportedCount: 2 });
    expect(await readFile(path.join(outputDir, `${VIDEO_ID}_stats.txt`), "utf-8")).toBe(
      `Video Title: Launch Trailer\nVideo ID: ${VIDEO_ID}\nViews: 1500\n`,
    );
  });

  it("reports an analyzer crash as a failed video", async () => {
    const reports = await runHarvest([VIDEO_ID], {
      analyzer: { analyze: async () => Promise.reject(new Error("analyzer exploded")) },
      outputDir,
      concurrency: 1,
    });

    expect(reports).toEqual([{ status: "failed", input: VIDEO_ID, videoId: VIDEO_ID, message: "analyzer exploded" }]);
  });
});
