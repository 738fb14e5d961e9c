/**
 * Minimal JSON-over-HTTP helper for OpenAI-compatible endpoints
 * (`/embeddings`, `/chat/completions`).
 */

export interface OpenAIEndpointOptions {
  /** Base URL without trailing slash, e.g. `https://api.openai.com/v1`. */
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

/** Transport-level failure of an OpenAI-compatible call. */
export class OpenAIRequestError extends Error {
  public readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OpenAIRequestError";
    this.status = status;
  }
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * @throws {OpenAIRequestError} On network failure, timeout, non-2xx status or a non-JSON body.
 */
export async function postJson(
  opts: OpenAIEndpointOptions,
  route: string,
  body: unknown,
): Promise<unknown> {
  const doFetch = opts.fetchImpl ?? fetch;
  const url = `${opts.baseUrl}${route}`;
  let res: Response;
  try {
    res = await doFetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${opts.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (e) {
    throw new OpenAIRequestError(`Request to ${url} failed: ${String(e)}`, null, { cause: e });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new OpenAIRequestError(`API error (${res.status}) from ${route}: ${text}`, res.status);
  }

  try {
    return await res.json();
  } catch (e) {
    throw new OpenAIRequestError(`Invalid JSON from ${route}`, res.status, { cause: e });
  }
}
