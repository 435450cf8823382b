import * as cheerio from "cheerio";
import { DataShapeError } from "./errors.js";

export interface RedirectForm {
  id: string | null;
  action: string;
  fields: Record<string, string>;
}

export interface ChallengeContext {
  uuid: string;
  /** Query parameters of the login page, forwarded with the credentials. */
  queryParams: Record<string, string>;
  /** The login page itself; sent as Referer when fetching the captcha. */
  pageUrl: string;
}

/**
 * Reads the first form of an auto-submitting redirect page. The action is resolved
 * against `pageUrl`, and every named input is collected, unnamed ones are skipped.
 */
export function extractRedirectForm(html: string, pageUrl: string): RedirectForm {
  const $ = cheerio.load(html);
  const form = $("form").first();
  if (form.length === 0) {
    throw new DataShapeError(`No form found on ${pageUrl}`, html);
  }

  const rawAction = form.attr("action");
  if (!rawAction) {
    throw new DataShapeError(`Form on ${pageUrl} has no action`, html);
  }

  const fields: Record<string, string> = {};
  form.find("input").each((_, el) => {
    const input = $(el);
    const name = input.attr("name");
    if (!name) return;
    fields[name] = input.attr("value") ?? "";
  });

  return {
    id: form.attr("id") ?? null,
    action: new URL(rawAction, pageUrl).toString(),
    fields
  };
}

export function extractChallenge(html: string, pageUrl: string): ChallengeContext {
  const $ = cheerio.load(html);
  const href = $("a#firefox_link").attr("href");
  if (!href) {
    throw new DataShapeError("Login page is missing the firefox_link anchor", html);
  }

  const uuid = new URL(href, pageUrl).searchParams.get("uuid");
  if (!uuid) {
    throw new DataShapeError("Login page anchor carries no uuid", href);
  }

  const queryParams: Record<string, string> = {};
  for (const [key, value] of new URL(pageUrl).searchParams) {
    if (!(key in queryParams)) queryParams[key] = value;
  }

  return { uuid, queryParams, pageUrl };
}
