import { z } from "zod";
import { TOKEN_BY_ID_URL, ltiLaunchUrl } from "./endpoints.js";
import { DataShapeError, TokenError } from "./errors.js";
import { extractRedirectForm, type RedirectForm } from "./forms.js";
import { expectSuccess, readJson, type HttpSession, type RequestOptions } from "./http.js";
import type { EntityId, SubjectToken } from "./types.js";

const TokenResponseSchema = z
  .object({
    code: z.union([z.number(), z.string()]),
    message: z.string().nullish(),
    data: z.unknown()
  })
  .passthrough();

const TokenDataSchema = z
  .object({
    token: z.string(),
    params: z.object({ courId: z.union([z.string(), z.number()]) }).passthrough()
  })
  .passthrough();

async function followForm(
  http: HttpSession,
  method: "GET" | "POST",
  url: string,
  options: RequestOptions,
  label: string
): Promise<RedirectForm> {
  const pending = method === "GET" ? http.get(url, options) : http.post(url, options);
  const res = await expectSuccess(pending, label);
  const form = extractRedirectForm(await res.text(), res.url());
  if (form.id === "login_form") {
    throw new TokenError("SessionExpired", "Canvas asked for a login; authenticate again");
  }
  return form;
}

/**
 * Walks the Canvas "Classroom Video" launch: the LTI launch form, the tool login
 * form, then the redirect whose query string is traded for a subject-scoped token.
 * Every hop needs the previous answer, so nothing here can be skipped or reordered.
 */
export async function acquireToken(http: HttpSession, subjectId: EntityId): Promise<SubjectToken> {
  const launch = await followForm(http, "GET", ltiLaunchUrl(subjectId), {}, "LTI launch");
  const toolLogin = await followForm(http, "POST", launch.action, { form: launch.fields }, "LTI tool login");

  const redirect = await expectSuccess(
    http.post(toolLogin.action, { form: toolLogin.fields, maxRedirects: 0 }),
    "LTI token redirect"
  );
  const location = redirect.headers()["location"];
  if (!location) {
    throw new DataShapeError("Token redirect carried no location header", redirect.headers());
  }
  const queryStart = location.indexOf("?");
  if (queryStart < 0 || queryStart === location.length - 1) {
    throw new DataShapeError("Token redirect location has no query string", location);
  }

  const res = await expectSuccess(http.get(`${TOKEN_BY_ID_URL}?${location.slice(queryStart + 1)}`), "Token lookup");
  const body = await readJson(res, TokenResponseSchema, "Token lookup");
  if (Number(body.code) !== 0) {
    throw new TokenError("Rejected", body.message ?? "Token lookup rejected", body);
  }

  const data = TokenDataSchema.safeParse(body.data);
  if (!data.success) {
    throw new DataShapeError("Token lookup returned no token", body);
  }
  return {
    accessToken: data.data.token,
    canvasSubjectId: String(data.data.params.courId)
  };
}
