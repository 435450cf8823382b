import fs from "node:fs";
import path from "node:path";
import { exiftool, type WriteTags } from "exiftool-vendored";
import { DateTime } from "luxon";
import type { DownloadJob } from "./types.js";

export const DEFAULT_LOCAL_TZ = "Asia/Shanghai";

const VIDEO_EXTENSIONS = new Set(["mp4", "mov", "m4v"]);

export interface PreparedTimestamp {
  exif: string;
  file: string;
  log: string;
}

/** Course times come back as local wall-clock strings (`2024-09-10 08:00:00`). */
export function prepareTimestamp(raw: string, timezone: string): PreparedTimestamp | null {
  const normalized = raw.trim().replace(" ", "T");
  let dt = DateTime.fromISO(normalized, { zone: timezone });
  if (!dt.isValid) {
    dt = DateTime.fromSQL(raw.trim(), { zone: timezone });
  }
  if (!dt.isValid) return null;

  return {
    exif: dt.toFormat("yyyy:MM:dd HH:mm:ss"),
    file: dt.toFormat("yyyy-MM-dd'T'HH:mm:ssZZ"),
    log: dt.toISO() ?? dt.toString()
  };
}

export function videoTags(ts: PreparedTimestamp, title?: string): WriteTags {
  const tags: WriteTags = {
    CreateDate: ts.exif,
    ModifyDate: ts.exif,
    TrackCreateDate: ts.exif,
    TrackModifyDate: ts.exif,
    MediaCreateDate: ts.exif,
    MediaModifyDate: ts.exif,
    FileModifyDate: ts.file
  };
  if (title) tags.Title = title;
  return tags;
}

/**
 * Stamps every downloaded video of the manifest with its course start time. Jobs whose
 * file is missing (aria2c skipped or failed them) or whose time does not parse are left alone.
 */
export async function stampDownloads(dir: string, jobs: DownloadJob[], timezone = DEFAULT_LOCAL_TZ): Promise<number> {
  let stamped = 0;
  try {
    for (const job of jobs) {
      const filePath = path.join(dir, job.outputPath);
      const ext = path.extname(filePath).toLowerCase().replace(/^\./, "");
      if (!VIDEO_EXTENSIONS.has(ext) || !fs.existsSync(filePath)) continue;
      if (!job.startTime) continue;

      const ts = prepareTimestamp(job.startTime, timezone);
      if (!ts) {
        console.warn(`   ⚠ Failed to parse start time '${job.startTime}' for ${job.outputPath}`);
        continue;
      }
      await exiftool.write(filePath, videoTags(ts, job.title), ["-overwrite_original", "-P", "-m"]);
      console.log(`   🎬 QuickTime dates set (LOCAL) → ${path.basename(filePath)} ← ${ts.log}`);
      stamped += 1;
    }
  } finally {
    await exiftool.end();
  }
  return stamped;
}
