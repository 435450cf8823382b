import type { TranscriptSegment } from "./types.js";

const pad = (value: number, size = 2) => String(value).padStart(size, "0");

/** `HH:MM:SS,mmm`; hours keep counting past 24. */
export function formatTimestamp(ms: number): string {
  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  const millis = ms % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)},${pad(millis, 3)}`;
}

export function renderSubtitles(segments: TranscriptSegment[]): string {
  return segments
    .map((segment, idx) => {
      const text = segment.text.replace(/\n/g, " ").trim();
      return `${idx + 1}\n${formatTimestamp(segment.start)} --> ${formatTimestamp(segment.end)}\n${text}\n\n`;
    })
    .join("")
    .trim();
}
