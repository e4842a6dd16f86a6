const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

const VIDEO_URL =
  /(?:youtube(?:-nocookie)?\.com\/(?:watch\?(?:[^#\s]*&)?v=|embed\/|v\/|shorts\/|live\/)|youtu\.be\/)([a-zA-Z0-9_-]{11})(?![a-zA-Z0-9_-])/i;

/** Returns the 11-character video id of a YouTube URL or bare id, or `null`. */
export function extractVideoId(urlOrId: string | null | undefined): string | null {
  if (!urlOrId) {
    return null;
  }

  const trimmed = urlOrId.trim();
  if (BARE_VIDEO_ID.test(trimmed)) {
    return trimmed;
  }

  const match = VIDEO_URL.exec(trimmed);
  return match?.[1] ?? null;
}
