import { z } from "zod";
import type { CredentialStore } from "./credentialStore.js";
import { AUTH_TIMEOUT_MS, CAPTCHA_URL, IDP_HOST, ULOGIN_URL } from "./endpoints.js";
import { AuthError } from "./errors.js";
import { extractChallenge, type ChallengeContext } from "./forms.js";
import {
  createHttpSession,
  expectSuccess,
  hostOf,
  readJson,
  type HttpSession,
  type SessionFactory,
  type StoredCookie
} from "./http.js";
import type { Operator } from "./operator.js";

export interface Session {
  http: HttpSession;
  /** True when the stored cookie was still accepted and no prompt was needed. */
  resumed: boolean;
}

interface Credentials {
  username: string;
  password: string;
}

type LoginState =
  | { step: "probe" }
  | { step: "credentials"; challenge: ChallengeContext; username?: string }
  | { step: "captcha"; challenge: ChallengeContext; credentials: Credentials }
  | { step: "submit"; challenge: ChallengeContext; credentials: Credentials; captcha: string }
  | { step: "authenticated"; resumed: boolean };

export type LoginOutcome =
  | { kind: "success" }
  | { kind: "badCredentials" }
  | { kind: "badCaptcha" }
  | { kind: "unknown"; payload: unknown };

const LoginResponseSchema = z
  .object({
    errno: z.union([z.number(), z.string()]).optional(),
    code: z.string().optional()
  })
  .passthrough();

export function parseLoginOutcome(payload: z.infer<typeof LoginResponseSchema>): LoginOutcome {
  if (Number(payload.errno ?? 1) === 0) return { kind: "success" };
  if (payload.code === "WRONG_USER_OR_PASSWORD") return { kind: "badCredentials" };
  if (payload.code === "WRONG_CAPTCHA") return { kind: "badCaptcha" };
  return { kind: "unknown", payload };
}

export function loginFailure(outcome: Exclude<LoginOutcome, { kind: "success" }>): AuthError {
  switch (outcome.kind) {
    case "badCredentials":
      return new AuthError("BadCredentials", "Incorrect username or password.");
    case "badCaptcha":
      return new AuthError("BadCaptcha", "Incorrect captcha.");
    case "unknown":
      return new AuthError("Unknown", "Login rejected", outcome.payload);
  }
}

export interface AuthenticateOptions {
  clientUrl: string;
  cookie?: StoredCookie | null;
  operator: Operator;
  store: CredentialStore;
  openSession?: SessionFactory;
  /** Epoch milliseconds for the captcha cache-buster. */
  now?: () => number;
}

/**
 * Signs in to jAccount for `clientUrl`. A stored cookie that is still valid ends the
 * flow after the probe; otherwise the operator is asked for credentials and a captcha
 * until the identity provider accepts them. Only wrong credentials and wrong captchas
 * are retried, any other failure ends the attempt.
 */
export async function authenticate(options: AuthenticateOptions): Promise<Session> {
  const { clientUrl, operator, store } = options;
  const openSession = options.openSession ?? createHttpSession;
  const now = options.now ?? Date.now;

  const http = await openSession(options.cookie ? [options.cookie] : []);
  try {
    let state: LoginState = { step: "probe" };
    while (state.step !== "authenticated") {
      switch (state.step) {
        case "probe": {
          const res = await expectSuccess(
            http.get(clientUrl, { timeout: AUTH_TIMEOUT_MS }),
            "Login probe"
          );
          if (hostOf(res.url()) !== IDP_HOST) {
            console.log("🔓 Logged in with stored cookie.");
            state = { step: "authenticated", resumed: true };
            break;
          }
          console.log("🔐 Login required, please proceed with authentication.");
          state = { step: "credentials", challenge: extractChallenge(await res.text(), res.url()) };
          break;
        }

        case "credentials": {
          const username = await operator.askUsername(state.username);
          const password = await operator.askPassword(username);
          state = { step: "captcha", challenge: state.challenge, credentials: { username, password } };
          break;
        }

        case "captcha": {
          const image = await fetchCaptcha(http, state.challenge, now());
          const captcha = await operator.solveCaptcha(image);
          state = { ...state, step: "submit", captcha };
          break;
        }

        case "submit": {
          const { challenge, credentials }: { challenge: ChallengeContext; credentials: Credentials } = state;
          const outcome = await submitLogin(http, challenge, credentials, state.captcha);
          if (outcome.kind === "success") {
            await expectSuccess(http.get(clientUrl, { timeout: AUTH_TIMEOUT_MS }), "Login finalize");
            console.log("💯 Logged in with password.");
            state = { step: "authenticated", resumed: false };
            break;
          }
          const failure = loginFailure(outcome);
          if (!failure.retryable) throw failure;
          console.warn(`⚠️  ${failure.message}`);
          state =
            failure.kind === "BadCredentials"
              ? { step: "credentials", challenge, username: credentials.username }
              : { step: "captcha", challenge, credentials };
          break;
        }
      }
    }

    if (!state.resumed) {
      const { cookies } = await http.storageState();
      store.save(cookies);
    }
    return { http, resumed: state.resumed };
  } catch (err) {
    await http.dispose();
    throw err;
  }
}

async function fetchCaptcha(http: HttpSession, challenge: ChallengeContext, timestamp: number): Promise<Buffer> {
  const res = await expectSuccess(
    http.get(CAPTCHA_URL, {
      params: { uuid: challenge.uuid, t: String(timestamp) },
      headers: { referer: challenge.pageUrl },
      timeout: AUTH_TIMEOUT_MS
    }),
    "Captcha fetch"
  );
  return res.body();
}

async function submitLogin(
  http: HttpSession,
  challenge: ChallengeContext,
  credentials: Credentials,
  captcha: string
): Promise<LoginOutcome> {
  const res = await expectSuccess(
    http.post(ULOGIN_URL, {
      form: {
        user: credentials.username,
        pass: credentials.password,
        captcha,
        lt: "p",
        uuid: challenge.uuid,
        ...challenge.queryParams
      },
      timeout: AUTH_TIMEOUT_MS
    }),
    "Login submit"
  );
  return parseLoginOutcome(await readJson(res, LoginResponseSchema, "Login submit"));
}
