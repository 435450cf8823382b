import pLimit from "p-limit";
import type { HttpSession } from "./http.js";
import { refreshCourses, updateCourses } from "./resourceSync.js";
import { listSubjects } from "./subjects.js";
import { TokenError } from "./errors.js";
import { acquireToken } from "./tokenExchange.js";
import { entityKey, hasDownloadUrls, type Snapshot, type Subject } from "./types.js";

export type SyncMode = "refresh" | "update";

export interface SubjectFailure {
  subject: Subject;
  stage: "token" | "courses";
  error: Error;
}

export interface SyncResult {
  snapshot: Snapshot;
  failures: SubjectFailure[];
}

export interface SyncOptions {
  /** Authenticated Canvas session; used one request at a time. */
  session: HttpSession;
  /** Cookie-less context for the video service, shared by the course workers. */
  api: HttpSession;
  previous?: Snapshot | null;
  mode: SyncMode;
  concurrency: number;
  now?: () => number;
}

const asError = (err: unknown) => (err instanceof Error ? err : new Error(String(err)));

/**
 * Lists subjects, mints a token for each over the shared session, then syncs the
 * courses of every subject in a bounded pool. A subject that fails keeps whatever
 * the previous snapshot held for it and is reported in `failures`. An expired Canvas
 * session aborts the whole run, since every later subject would fail the same way.
 */
export async function syncSnapshot(options: SyncOptions): Promise<SyncResult> {
  const { session, api, mode } = options;
  const now = options.now ?? Date.now;
  const previousById = new Map(
    (options.previous?.subjects ?? []).map((subject) => [entityKey(subject.id), subject])
  );
  const failures: SubjectFailure[] = [];

  const listed = await listSubjects(session);
  console.log(`📚 Found ${listed.length} subjects.`);

  const subjects: Subject[] = [];
  for (const fresh of listed) {
    const prior = previousById.get(entityKey(fresh.id));
    const subject: Subject = { ...fresh, courses: mode === "update" ? prior?.courses ?? [] : [] };
    try {
      subject.token = await acquireToken(session, subject.id);
    } catch (err) {
      if (err instanceof TokenError && err.kind === "SessionExpired") throw err;
      console.error(`   ⚠ [${subject.name}] Token exchange failed: ${asError(err).message}`);
      failures.push({ subject, stage: "token", error: asError(err) });
      subject.courses = prior?.courses ?? [];
      if (prior?.token) subject.token = prior.token;
    }
    subjects.push(subject);
  }

  const limit = pLimit(Math.max(1, options.concurrency));
  await Promise.all(
    subjects.map((subject) =>
      limit(async () => {
        const token = subject.token;
        if (!token || failures.some((f) => f.subject === subject)) return;
        try {
          const before = subject.courses;
          subject.courses =
            mode === "refresh" ? await refreshCourses(api, token) : await updateCourses(api, token, before);
          const resolved = subject.courses.filter(hasDownloadUrls).length;
          console.log(`🎬 [${subject.name}] ${subject.courses.length} courses, ${resolved} with media.`);
        } catch (err) {
          console.error(`   ⚠ [${subject.name}] Course sync failed: ${asError(err).message}`);
          failures.push({ subject, stage: "courses", error: asError(err) });
          subject.courses = previousById.get(entityKey(subject.id))?.courses ?? [];
        }
      })
    )
  );

  return {
    snapshot: { subjects, lastUpdateAt: now() / 1000 },
    failures
  };
}
