/**
 * HTTP helpers: thin wrappers around native fetch for the distributor.
 *
 * Non-2xx responses throw with the service's `{ error, detail }` body
 * folded into the message.
 */

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string | null,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

async function send<T>(method: string, url: string, init: RequestInit): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
  let res: Response;
  try {
    res = await fetch(url, { ...init, method, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }

  const text = await res.text();
  if (!res.ok) {
    const { code, detail } = parseError(text);
    throw new HttpError(
      res.status,
      code,
      `${method} ${url} → ${res.status}: ${code ?? text}${detail ? ` (${detail})` : ""}`,
    );
  }
  return JSON.parse(text) as T;
}

function parseError(text: string): { code: string | null; detail: string | null } {
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
      const detail = "detail" in body && typeof body.detail === "string" ? body.detail : null;
      return { code: body.error, detail };
    }
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
  }
  return { code: null, detail: null };
}

/** JSON GET request. Throws on non-2xx. */
export function httpGet<T>(url: string, headers?: Record<string, string>): Promise<T> {
  return send<T>("GET", url, { headers });
}

/** JSON POST request. Throws on non-2xx. */
export function httpPost<T>(url: string, body: unknown, headers?: Record<string, string>): Promise<T> {
  return send<T>("POST", url, {
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}
