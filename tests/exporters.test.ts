import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { exportFileNames, formatVideoStats, serializeComments, writeVideoExport } from "../src/harvester/exporters.js";
import type { CommentRecord, VideoSummary } from "../src/harvester/types.js";

const VIDEO: VideoSummary = { videoId: "abcDEF12345", title: "Launch Trailer", views: 1500, likes: "N/A" };

const COMMENTS: CommentRecord[] = [
  {
    comment_id: "c1",
    author: "Ada",
    published_at: "2024-02-01T09:00:00Z",
    updated_at: "2024-02-01T09:05:00Z",
    comment_text: "Looks great",
    like_count: 3,
  },
];

describe("formatVideoStats", () => {
  it("writes one line per requested field", () => {
    expect(formatVideoStats(VIDEO)).toBe(
      "Video Title: Launch Trailer\nVideo ID: abcDEF12345\nViews: 1500\nLikes: N/A\n",
    );
  });

  it("omits statistics that were not requested", () => {
    expect(formatVideoStats({ ...VIDEO, views: null, likes: null })).toBe(
      "Video Title: Launch Trailer\nVideo ID: abcDEF12345\n",
    );
  });
});

describe("serializeComments", () => {
  it("indents with four spaces and keeps record keys in order", () => {
    expect(serializeComments(COMMENTS)).toBe(
      [
        "[",
        "    {",
        '        "comment_id": "c1",',
        '        "author": "Ada",',
        '        "published_at": "2024-02-01T09:00:00Z",',
        '        "updated_at": "2024-02-01T09:05:00Z",',
        '        "comment_text": "Looks great",',
        '        "like_count": 3',
        "    }",
        "]",
      ].join("\n"),
    );
  });

  it("writes an empty array for no comments", () => {
    expect(serializeComments([])).toBe("[]");
  });
});

describe("writeVideoExport", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "harvester-export-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("creates the output directory and writes both files", async () => {
    const outputDir = path.join(workDir, "nested", "out");

    const paths = await writeVideoExport(outputDir, VIDEO, COMMENTS);

    expect(paths).toEqual({
      statsPath: path.join(outputDir, "abcDEF12345_stats.txt"),
      commentsPath: path.join(outputDir, "abcDEF12345_comments.json"),
    });
    expect(await readFile(paths.statsPath, "utf-8")).toBe(formatVideoStats(VIDEO));
    expect(JSON.parse(await readFile(paths.commentsPath, "utf-8"))).toEqual(COMMENTS);
  });

  it("overwrites an earlier export of the same video", async () => {
    await writeVideoExport(workDir, VIDEO, COMMENTS);
    const paths = await writeVideoExport(workDir, { ...VIDEO, title: "Renamed" }, []);

    expect(await readFile(paths.statsPath, "utf-8")).toContain("Video Title: Renamed\n");
    expect(await readFile(paths.commentsPath, "utf-8")).toBe("[]");
  });
});

describe("exportFileNames", () => {
  it("derives both names from the video id", () => {
    expect(exportFileNames("xyz")).toEqual({ stats: "xyz_stats.txt", comments: "xyz_comments.json" });
  });
});
