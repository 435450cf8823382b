import type { HttpResponse, HttpSession, RequestOptions, StoredCookie } from "../http.js";

export interface FakeReply {
  status?: number;
  url?: string;
  headers?: Record<string, string>;
  body?: string | Buffer;
  json?: unknown;
}

export interface RecordedCall {
  method: "GET" | "POST";
  url: string;
  options: RequestOptions;
}

type Responder = FakeReply | ((call: RecordedCall) => FakeReply);

interface Route {
  method: "GET" | "POST";
  prefix: string;
  replies: Responder[];
  hits: number;
}

export function fakeResponse(requestUrl: string, reply: FakeReply): HttpResponse {
  const body = reply.json !== undefined ? JSON.stringify(reply.json) : reply.body ?? "";
  const buffer = typeof body === "string" ? Buffer.from(body, "utf8") : body;
  const status = reply.status ?? 200;
  return {
    url: () => reply.url ?? requestUrl,
    status: () => status,
    statusText: () => (status < 400 ? "OK" : "Error"),
    headers: () => reply.headers ?? {},
    body: async () => buffer,
    text: async () => buffer.toString("utf8"),
    json: async () => JSON.parse(buffer.toString("utf8"))
  };
}

/**
 * Scripted stand-in for a Playwright request context. Routes match on method and URL
 * prefix; a route with several replies answers them in order and repeats the last one.
 */
export class FakeHttpSession implements HttpSession {
  readonly calls: RecordedCall[] = [];
  disposed = false;
  private readonly routes: Route[] = [];

  constructor(private readonly cookies: StoredCookie[] = []) {}

  on(method: "GET" | "POST", prefix: string, ...replies: Responder[]): this {
    this.routes.push({ method, prefix, replies, hits: 0 });
    return this;
  }

  callsTo(method: "GET" | "POST", prefix: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.url.startsWith(prefix));
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.dispatch({ method: "GET", url, options });
  }

  async post(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.dispatch({ method: "POST", url, options });
  }

  async storageState(): Promise<{ cookies: StoredCookie[] }> {
    return { cookies: this.cookies };
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }

  private dispatch(call: RecordedCall): HttpResponse {
    this.calls.push(call);
    const route = this.routes.find((r) => r.method === call.method && call.url.startsWith(r.prefix));
    if (!route) {
      throw new Error(`No fake route for ${call.method} ${call.url}`);
    }
    route.hits += 1;
    const responder = route.replies[Math.min(route.hits, route.replies.length) - 1];
    const reply = typeof responder === "function" ? responder(call) : responder;
    return fakeResponse(call.url, reply);
  }
}

export function cookie(name: string, value: string, domain = "jaccount.sjtu.edu.cn"): StoredCookie {
  return { name, value, domain, path: "/", expires: -1, httpOnly: true, secure: true, sameSite: "Lax" };
}
