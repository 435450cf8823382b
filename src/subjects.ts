import { z } from "zod";
import { FAVORITES_URL } from "./endpoints.js";
import { expectSuccess, readJson, type HttpSession } from "./http.js";
import type { Subject } from "./types.js";

const FavoriteCourseSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string(),
    account_id: z.union([z.number(), z.string()]).nullish()
  })
  .passthrough();

/** Subjects pinned in the Canvas "Courses" sidebar, without tokens or courses yet. */
export async function listSubjects(http: HttpSession): Promise<Subject[]> {
  const res = await expectSuccess(
    http.get(FAVORITES_URL, { headers: { accept: "application/json" } }),
    "Favorite courses"
  );
  const records = await readJson(res, z.array(FavoriteCourseSchema), "Favorite courses");
  return records.map((record) => ({
    id: record.id,
    name: record.name,
    ...(record.account_id != null ? { account: record.account_id } : {}),
    courses: []
  }));
}
