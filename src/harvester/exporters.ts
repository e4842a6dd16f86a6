import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { CommentRecord, VideoSummary } from "./types.js";

export interface ExportPaths {
  statsPath: string;
  commentsPath: string;
}

/** Views and likes lines appear only for statistics that were requested. */
export function formatVideoStats(video: VideoSummary): string {
  const lines = [`Video Title: ${video.title}`, `Video ID: ${video.videoId}`];
  if (video.views !== null) lines.push(`Views: ${video.views}`);
  if (video.likes !== null) lines.push(`Likes: ${video.likes}`);
  return lines.map((line) => `${line}\n`).join("");
}

export function serializeComments(records: CommentRecord[]): string {
  return JSON.stringify(records, null, 4);
}

export function exportFileNames(videoId: string): { stats: string; comments: string } {
  return {
    stats: `${videoId}_stats.txt`,
    comments: `${videoId}_comments.json`,
  };
}

export async function writeVideoExport(
  outputDir: string,
  video: VideoSummary,
  comments: CommentRecord[],
): Promise<ExportPaths> {
  await mkdir(outputDir, { recursive: true });

  const names = exportFileNames(video.videoId);
  const statsPath = path.join(outputDir, names.stats);
  const commentsPath = path.join(outputDir, names.comments);

  await writeFile(statsPath, formatVideoStats(video), "utf-8");
  await writeFile(commentsPath, serializeComments(comments), "utf-8");

  return { statsPath, commentsPath };
}
