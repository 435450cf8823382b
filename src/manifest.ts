import { promises as fsPromises } from "node:fs";
import path from "node:path";
import type { HttpSession } from "./http.js";
import { resolveTranscripts } from "./resourceSync.js";
import { renderSubtitles } from "./subtitles.js";
import {
  channelEntries,
  entityKey,
  type Course,
  type DownloadJob,
  type Selection,
  type Subject
} from "./types.js";

const { mkdir, writeFile } = fsPromises;

export interface Manifest {
  jobs: DownloadJob[];
  text: string;
}

export interface SelectedCourse {
  subject: Subject;
  course: Course;
}

/**
 * Turns `subjectId` (every course of the subject) and `subjectId:courseId` arguments
 * into a selection.
 */
export function parseSelection(args: string[], subjects: Subject[]): Selection {
  const selection: Selection = new Map();
  for (const arg of args) {
    const [subjectKey, courseKey] = arg.split(":", 2);
    if (!subjectKey) continue;
    let set = selection.get(subjectKey);
    if (!set) {
      set = new Set<string>();
      selection.set(subjectKey, set);
    }
    if (courseKey) {
      set.add(courseKey);
      continue;
    }
    const subject = subjects.find((s) => entityKey(s.id) === subjectKey);
    for (const course of subject?.courses ?? []) set.add(entityKey(course.id));
  }
  return selection;
}

export function selectCourses(selection: Selection, subjects: Subject[]): SelectedCourse[] {
  const bySubject = new Map(subjects.map((subject) => [entityKey(subject.id), subject]));
  const picked: SelectedCourse[] = [];

  for (const [subjectKey, courseKeys] of selection) {
    const subject = bySubject.get(subjectKey);
    if (!subject) {
      console.warn(`⚠️  Skipping unknown subject ${subjectKey}`);
      continue;
    }
    const byCourse = new Map(subject.courses.map((course) => [entityKey(course.id), course]));
    for (const courseKey of courseKeys) {
      const course = byCourse.get(courseKey);
      if (!course) {
        console.warn(`⚠️  [${subject.name}] Skipping unknown course ${courseKey}`);
        continue;
      }
      picked.push({ subject, course });
    }
  }
  return picked;
}

export function extensionOf(url: string): string {
  return url.split("?")[0].split(".").pop() ?? "";
}

/**
 * Builds the aria2 input list. Output paths are `{subject}/{course}_{channel}.{ext}`;
 * two courses sharing a name within one subject map to the same path and are left so.
 */
export function buildManifest(selection: Selection, subjects: Subject[], includeSecondaryChannel: boolean): Manifest {
  const jobs: DownloadJob[] = [];
  for (const { subject, course } of selectCourses(selection, subjects)) {
    const entries = channelEntries(course.downloadUrls);
    if (entries.length === 0) {
      console.warn(`⚠️  [${subject.name}] ${course.name} has no resolved media; run sync first.`);
      continue;
    }
    for (const [channel, url] of entries) {
      if (channel === 1 && !includeSecondaryChannel) continue;
      jobs.push({
        url,
        outputPath: `${subject.name}/${course.name}_${channel}.${extensionOf(url)}`,
        channel,
        title: course.name,
        startTime: course.startTime
      });
    }
  }

  return {
    jobs,
    text: jobs.map((job) => `${job.url}\n  out=${job.outputPath}\n`).join("\n")
  };
}

export interface SubtitleFailure {
  subject: Subject;
  course: Course;
  error: Error;
}

export interface SubtitleResult {
  written: string[];
  failures: SubtitleFailure[];
}

/**
 * Fetches the transcript of every selected course and writes `{subject}/{course}_0.srt`
 * under `outdir`. A course whose transcript cannot be fetched or written is reported
 * and the rest carry on.
 */
export async function writeSubtitleFiles(
  api: HttpSession,
  selection: Selection,
  subjects: Subject[],
  outdir: string
): Promise<SubtitleResult> {
  const result: SubtitleResult = { written: [], failures: [] };
  for (const { subject, course } of selectCourses(selection, subjects)) {
    if (!subject.token) {
      console.warn(`⚠️  [${subject.name}] No access token; skipping subtitles.`);
      continue;
    }
    try {
      const segments = await resolveTranscripts(api, subject.token, course.id);
      const dir = path.join(outdir, subject.name);
      await mkdir(dir, { recursive: true });
      const filePath = path.join(dir, `${course.name}_0.srt`);
      await writeFile(filePath, renderSubtitles(segments), "utf8");
      result.written.push(filePath);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(`   ⚠ [${subject.name}] Subtitles for ${course.name} failed: ${error.message}`);
      result.failures.push({ subject, course, error });
    }
  }
  return result;
}
