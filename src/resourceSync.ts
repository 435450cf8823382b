import { z } from "zod";
import { TRANSCRIPT_URL, VIDEO_INFO_URL, VIDEO_LIST_URL } from "./endpoints.js";
import { DataShapeError } from "./errors.js";
import { expectSuccess, readJson, type HttpSession } from "./http.js";
import {
  entityKey,
  hasDownloadUrls,
  type Course,
  type DownloadUrls,
  type EntityId,
  type SubjectToken,
  type TranscriptSegment
} from "./types.js";

const Id = z.union([z.number(), z.string()]);

const VideoListSchema = z
  .object({
    code: z.union([z.number(), z.string()]),
    data: z
      .object({
        records: z
          .array(
            z
              .object({
                courId: Id,
                videoName: z.string().nullish(),
                courseBeginTime: z.string().nullish(),
                courseEndTime: z.string().nullish(),
                videoId: Id
              })
              .passthrough()
          )
          .nullish()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

const VideoInfoSchema = z
  .object({
    data: z
      .object({
        videoPlayResponseVoList: z
          .array(
            z
              .object({
                cdviViewNum: z.union([z.number(), z.string()]),
                rtmpUrlHdv: z.string().min(1)
              })
              .passthrough()
          )
          .nullish()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

const TranscriptSchema = z
  .object({
    data: z
      .object({
        originalList: z
          .array(z.object({ bg: z.number(), ed: z.number() }).catchall(z.unknown()))
          .nullish()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export type MediaResolver = (mediaRef: string) => Promise<DownloadUrls>;

const tokenHeader = (token: SubjectToken) => ({ token: token.accessToken });

/** Lists the recordings of one subject. `downloadUrls` is left unresolved. */
export async function listCourses(api: HttpSession, token: SubjectToken): Promise<Course[]> {
  const res = await expectSuccess(
    api.post(VIDEO_LIST_URL, {
      data: { canvasCourseId: encodeURIComponent(token.canvasSubjectId) },
      headers: tokenHeader(token)
    }),
    "Course list"
  );
  const body = await readJson(res, VideoListSchema, "Course list");
  if (Number(body.code) === -1 || !body.data) return [];

  return (body.data.records ?? []).map((record) => ({
    id: record.courId,
    name: record.videoName ?? String(record.courId),
    startTime: record.courseBeginTime ?? null,
    endTime: record.courseEndTime ?? null,
    mediaRef: String(record.videoId)
  }));
}

/**
 * Resolves the playable URLs of one recording. The service has no channel field; the
 * stream whose view counter reads zero is the camera (0) and the other one the screen (1).
 */
export async function resolveMedia(api: HttpSession, token: SubjectToken, mediaRef: string): Promise<DownloadUrls> {
  const res = await expectSuccess(
    api.post(VIDEO_INFO_URL, {
      multipart: { playTypeHls: "true", isAudit: "true", id: mediaRef },
      headers: tokenHeader(token)
    }),
    "Video info"
  );
  const body = await readJson(res, VideoInfoSchema, "Video info");
  if (!body.data) {
    throw new DataShapeError(`Video info for ${mediaRef} carried no data`, body);
  }

  const urls: DownloadUrls = {};
  for (const video of body.data.videoPlayResponseVoList ?? []) {
    const raw = video.cdviViewNum;
    const views = typeof raw === "string" && !raw.trim() ? Number.NaN : Number(raw);
    if (!Number.isFinite(views)) {
      throw new DataShapeError(`Video info for ${mediaRef} has a non-numeric view count`, video);
    }
    urls[views !== 0 ? 1 : 0] = video.rtmpUrlHdv;
  }
  return urls;
}

export async function resolveTranscripts(
  api: HttpSession,
  token: SubjectToken,
  courseId: EntityId,
  lang = "res"
): Promise<TranscriptSegment[]> {
  const res = await expectSuccess(
    api.post(TRANSCRIPT_URL, {
      data: { courseId, platform: 1 },
      headers: tokenHeader(token)
    }),
    "Transcript"
  );
  const body = await readJson(res, TranscriptSchema, "Transcript");
  if (!body.data) return [];

  return (body.data.originalList ?? []).map((item) => {
    const text = item[lang];
    return { start: item.bg, end: item.ed, text: typeof text === "string" ? text : "" };
  });
}

/**
 * Reconciles a fresh listing with what an earlier run already resolved. A course that
 * is known and carries download URLs is copied forward untouched; new or unresolved
 * courses go through `resolve`. Earlier courses missing from the fresh listing stay.
 */
export async function mergeCourses(
  previous: Map<string, Course>,
  fresh: Map<string, Course>,
  resolve: MediaResolver
): Promise<Map<string, Course>> {
  const merged = new Map(previous);
  for (const [key, course] of fresh) {
    const known = previous.get(key);
    if (known && hasDownloadUrls(known)) continue;
    merged.set(key, { ...course, downloadUrls: await resolve(course.mediaRef) });
  }
  return merged;
}

export const indexCourses = (courses: Course[]): Map<string, Course> =>
  new Map(courses.map((course) => [entityKey(course.id), course]));

/** Full resync: lists every course and resolves the media of each one. */
export async function refreshCourses(api: HttpSession, token: SubjectToken): Promise<Course[]> {
  return updateCourses(api, token, []);
}

/** Incremental resync: only new or unresolved courses get a media lookup. */
export async function updateCourses(api: HttpSession, token: SubjectToken, previous: Course[]): Promise<Course[]> {
  const fresh = await listCourses(api, token);
  const merged = await mergeCourses(indexCourses(previous), indexCourses(fresh), (mediaRef) =>
    resolveMedia(api, token, mediaRef)
  );
  return [...merged.values()];
}
