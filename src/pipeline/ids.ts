const BARE_ID = /^[a-zA-Z0-9_-]{11}$/;

/**
 * Accepts a full video URL or a bare YouTube video ID and returns a URL yt-dlp can fetch.
 */
export function toVideoUrl(videoOrUrl: string): string {
  const trimmed = videoOrUrl.trim();
  if (BARE_ID.test(trimmed)) return `https://www.youtube.com/watch?v=${trimmed}`;
  return trimmed;
}
