import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DataShapeError } from "./errors.js";
import type { Course, DownloadUrls, Snapshot, Subject } from "./types.js";

const Id = z.union([z.number(), z.string()]);

const CourseRecordSchema = z.object({
  id: Id,
  name: z.string(),
  start_time: z.string().nullable(),
  end_time: z.string().nullable(),
  media_ref: z.string(),
  download_urls: z.record(z.enum(["0", "1"]), z.string()).optional()
});

const SubjectRecordSchema = z
  .object({
    id: Id,
    name: z.string(),
    account: Id.optional(),
    access_token: z.string().optional(),
    canvas_subject_id: z.string().optional(),
    courses: z.array(CourseRecordSchema).default([])
  })
  .refine((subject) => (subject.access_token === undefined) === (subject.canvas_subject_id === undefined), {
    message: "access_token and canvas_subject_id must be present together"
  });

const SnapshotSchema = z.object({
  subjects: z.array(SubjectRecordSchema),
  last_update_at: z.number().nullable().default(null)
});

type CourseRecord = z.infer<typeof CourseRecordSchema>;
type SubjectRecord = z.infer<typeof SubjectRecordSchema>;

function toCourse(record: CourseRecord): Course {
  const course: Course = {
    id: record.id,
    name: record.name,
    startTime: record.start_time,
    endTime: record.end_time,
    mediaRef: record.media_ref
  };
  if (record.download_urls) {
    const urls: DownloadUrls = {};
    for (const [key, url] of Object.entries(record.download_urls)) {
      if (url) urls[Number(key) === 1 ? 1 : 0] = url;
    }
    course.downloadUrls = urls;
  }
  return course;
}

function toSubject(record: SubjectRecord): Subject {
  const subject: Subject = { id: record.id, name: record.name, courses: record.courses.map(toCourse) };
  if (record.account !== undefined) subject.account = record.account;
  if (record.access_token !== undefined && record.canvas_subject_id !== undefined) {
    subject.token = { accessToken: record.access_token, canvasSubjectId: record.canvas_subject_id };
  }
  return subject;
}

function fromCourse(course: Course): CourseRecord {
  const record: CourseRecord = {
    id: course.id,
    name: course.name,
    start_time: course.startTime,
    end_time: course.endTime,
    media_ref: course.mediaRef
  };
  if (course.downloadUrls) {
    const urls: Partial<Record<"0" | "1", string>> = {};
    for (const [channel, url] of Object.entries(course.downloadUrls)) {
      if (url) urls[channel === "1" ? "1" : "0"] = url;
    }
    record.download_urls = urls;
  }
  return record;
}

function fromSubject(subject: Subject) {
  return {
    id: subject.id,
    name: subject.name,
    ...(subject.account !== undefined ? { account: subject.account } : {}),
    ...(subject.token
      ? { access_token: subject.token.accessToken, canvas_subject_id: subject.token.canvasSubjectId }
      : {}),
    courses: subject.courses.map(fromCourse)
  };
}

export function parseSnapshot(raw: unknown): Snapshot {
  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataShapeError(`Invalid snapshot (${parsed.error.issues[0]?.message})`);
  }
  return {
    subjects: parsed.data.subjects.map(toSubject),
    lastUpdateAt: parsed.data.last_update_at
  };
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(
    { subjects: snapshot.subjects.map(fromSubject), last_update_at: snapshot.lastUpdateAt },
    null,
    2
  );
}

/** Missing file means "never synced"; a file that exists but does not parse is an error. */
export function loadSnapshot(filePath: string): Snapshot | null {
  if (!fs.existsSync(filePath)) return null;
  const text = fs.readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new DataShapeError(`Snapshot ${filePath} is not JSON`);
  }
  return parseSnapshot(raw);
}

export function saveSnapshot(filePath: string, snapshot: Snapshot): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, serializeSnapshot(snapshot), "utf8");
}
