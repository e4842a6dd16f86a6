import { UNKNOWN_AUTHOR, type CommentRecord, type RawCommentThread } from "./types.js";

function normalizeLikeCount(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return Number(value);
  }
  return 0;
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function normalizeCommentThread(item: RawCommentThread): CommentRecord {
  const topLevelComment = item.snippet?.topLevelComment;
  const snippet = topLevelComment?.snippet ?? {};

  return {
    comment_id: optionalString(topLevelComment?.id),
    author: optionalString(snippet.authorDisplayName) ?? UNKNOWN_AUTHOR,
    published_at: optionalString(snippet.publishedAt),
    updated_at: optionalString(snippet.updatedAt),
    comment_text: optionalString(snippet.textDisplay) ?? "",
    like_count: normalizeLikeCount(snippet.likeCount),
  };
}
