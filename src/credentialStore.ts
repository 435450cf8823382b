import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AUTH_COOKIE_NAME } from "./endpoints.js";
import type { StoredCookie } from "./http.js";

export interface CredentialStore {
  load(): StoredCookie | null;
  save(cookies: StoredCookie[]): void;
}

const StoredCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(["Strict", "Lax", "None"])
});

const StorageStateSchema = z.object({
  cookies: z.array(StoredCookieSchema),
  origins: z.array(z.unknown()).optional()
});

/**
 * Keeps the single jAccount cookie in a storage-state JSON file, the same shape
 * Playwright reads back with `storageState`.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  load(): StoredCookie | null {
    if (!fs.existsSync(this.filePath)) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      console.warn(`⚠️  Ignoring unreadable cookie file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
    const parsed = StorageStateSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`⚠️  Ignoring cookie file ${this.filePath}: unexpected shape`);
      return null;
    }
    return parsed.data.cookies.find((cookie) => cookie.name === AUTH_COOKIE_NAME && cookie.value) ?? null;
  }

  save(cookies: StoredCookie[]): void {
    const authCookie = cookies.find((cookie) => cookie.name === AUTH_COOKIE_NAME);
    if (!authCookie) {
      console.warn(`⚠️  No ${AUTH_COOKIE_NAME} cookie in the session; nothing saved.`);
      return;
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify({ cookies: [authCookie], origins: [] }, null, 2), "utf8");
    console.log(`🔑 Saved ${AUTH_COOKIE_NAME} → ${this.filePath}`);
  }
}
