import { request as pwRequest } from "playwright-core";
import type { z } from "zod";
import { DEFAULT_USER_AGENT } from "./endpoints.js";
import { DataShapeError, TransportError } from "./errors.js";

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: "Strict" | "Lax" | "None";
}

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string>;
  form?: Record<string, string>;
  multipart?: Record<string, string>;
  data?: Record<string, unknown>;
  maxRedirects?: number;
  timeout?: number;
}

export interface HttpResponse {
  url(): string;
  status(): number;
  statusText(): string;
  headers(): Record<string, string>;
  body(): Promise<Buffer>;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

/**
 * The slice of Playwright's `APIRequestContext` this client talks through. A real
 * context keeps the cookie jar between calls, which is what makes it a session.
 */
export interface HttpSession {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
  post(url: string, options?: RequestOptions): Promise<HttpResponse>;
  storageState(): Promise<{ cookies: StoredCookie[] }>;
  dispose(): Promise<void>;
}

export type SessionFactory = (cookies: StoredCookie[]) => Promise<HttpSession>;

export const createHttpSession: SessionFactory = async (cookies) => {
  return pwRequest.newContext({
    storageState: { cookies, origins: [] },
    extraHTTPHeaders: { "user-agent": DEFAULT_USER_AGENT }
  });
};

/**
 * Awaits a request and fails on transport errors and 4xx/5xx answers.
 * Redirect statuses pass, so a hop sent with `maxRedirects: 0` can read its `location`.
 */
export async function expectSuccess(pending: Promise<HttpResponse>, label: string): Promise<HttpResponse> {
  let response: HttpResponse;
  try {
    response = await pending;
  } catch (err) {
    throw TransportError.fromCause(label, err);
  }
  if (response.status() >= 400) {
    const text = await response.text().catch(() => "");
    throw new TransportError(
      "HTTPStatus",
      `${label} failed: ${response.status()} ${response.statusText()}`,
      response.status(),
      text
    );
  }
  return response;
}

export async function readJson<S extends z.ZodTypeAny>(
  response: HttpResponse,
  schema: S,
  label: string
): Promise<z.infer<S>> {
  const text = await response.text();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new DataShapeError(`${label} did not return JSON`, text);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DataShapeError(`${label} returned an unexpected shape (${parsed.error.issues[0]?.message})`, raw);
  }
  return parsed.data;
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}
