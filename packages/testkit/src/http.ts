/**
 * In-process fetch stub that records every request
 */

/**
 * A request as the stub saw it
 */
export interface RecordedRequest {
  method: string;
  url: string;
  /** Header names lower-cased */
  headers: Record<string, string>;
  /** Parsed JSON body, or undefined when none was sent */
  body: unknown;
  /** Whether a body field was present at all */
  hasBody: boolean;
}

/**
 * A canned response. Omit both `body` and `text` for an empty response.
 */
export interface StubResponse {
  status?: number;
  body?: unknown;
  text?: string;
}

export type StubHandler = (request: RecordedRequest) => StubResponse;

export interface StubFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function toResponse(stub: StubResponse): Response {
  const status = stub.status ?? 200;
  if (stub.text !== undefined) {
    return new Response(stub.text, { status });
  }
  if (stub.body !== undefined) {
    return new Response(JSON.stringify(stub.body), {
      status,
      headers: { "content-type": "application/json" },
    });
  }
  return new Response(null, { status });
}

/**
 * Create a fetch stub
 * @param responses - Queue of responses served in order, or a handler per request.
 *   An exhausted queue answers 200 with `{}`.
 */
export function createStubFetch(responses: StubResponse[] | StubHandler = []): StubFetch {
  const requests: RecordedRequest[] = [];
  const queue = Array.isArray(responses) ? [...responses] : [];

  const stub: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, name) => {
      headers[name] = value;
    });
    const rawBody = init?.body;
    const recorded: RecordedRequest = {
      method: init?.method ?? "GET",
      url: requestUrl(input),
      headers,
      body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
      hasBody: rawBody !== undefined && rawBody !== null,
    };
    requests.push(recorded);

    const next = Array.isArray(responses) ? queue.shift() : responses(recorded);
    return toResponse(next ?? { body: {} });
  };

  return { fetch: stub, requests };
}

/**
 * A fetch that always rejects, standing in for a network failure
 */
export function createFailingFetch(message = "connect ECONNREFUSED"): StubFetch {
  const requests: RecordedRequest[] = [];
  const stub: typeof fetch = async (input, init) => {
    requests.push({
      method: init?.method ?? "GET",
      url: requestUrl(input),
      headers: {},
      body: undefined,
      hasBody: false,
    });
    throw new TypeError(message);
  };
  return { fetch: stub, requests };
}

/**
 * A fetch that never answers, rejecting only once the caller aborts the request
 */
export function createStalledFetch(): StubFetch {
  const requests: RecordedRequest[] = [];
  const stub: typeof fetch = (input, init) => {
    requests.push({
      method: init?.method ?? "GET",
      url: requestUrl(input),
      headers: {},
      body: undefined,
      hasBody: false,
    });
    return new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
    });
  };
  return { fetch: stub, requests };
}
