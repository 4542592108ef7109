export interface FetchJsonResponseFixture {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * A route answers with one response, a queue of responses (the last one repeats once the
 * queue drains), or an Error thrown in place of a response to simulate a transport failure.
 */
export type FetchRouteFixture = FetchJsonResponseFixture | FetchJsonResponseFixture[] | Error;

export interface RecordedFetchCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | null;
}

export interface FetchJsonFixture {
  fetch: typeof globalThis.fetch;
  calls: RecordedFetchCall[];
  callsTo: (urlOrPath: string) => RecordedFetchCall[];
  setRoute: (urlOrPath: string, fixture: FetchRouteFixture) => void;
}

function normalizeInput(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  return input.url;
}

function normalizeBody(body: unknown): string | null {
  if (typeof body === "string") {
    return body;
  }
  if (body instanceof URLSearchParams) {
    return body.toString();
  }
  return null;
}

function buildJsonResponse({ status = 200, body = {}, headers = {} }: FetchJsonResponseFixture) {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      ...headers
    }
  });
}

function routeKeys(url: string): string[] {
  const parsed = new URL(url);
  return [url, `${parsed.origin}${parsed.pathname}`, parsed.pathname];
}

export function createFetchJsonFixture(
  fixtures: Record<string, FetchRouteFixture>,
  fallbackFixture: FetchJsonResponseFixture = { status: 404, body: { code: "not_found" } }
): FetchJsonFixture {
  const routes = new Map<string, FetchRouteFixture>(Object.entries(fixtures));
  const calls: RecordedFetchCall[] = [];

  const nextResponse = (key: string, fixture: FetchRouteFixture): Response => {
    if (fixture instanceof Error) {
      throw fixture;
    }

    if (!Array.isArray(fixture)) {
      return buildJsonResponse(fixture);
    }

    const [head, ...rest] = fixture;
    if (rest.length > 0) {
      routes.set(key, rest);
    }
    return buildJsonResponse(head ?? fallbackFixture);
  };

  const fetchFixture: typeof globalThis.fetch = async (input, init) => {
    const url = normalizeInput(input);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, name) => {
      headers[name] = value;
    });

    calls.push({
      url,
      method: (init?.method ?? "GET").toUpperCase(),
      headers,
      body: normalizeBody(init?.body)
    });

    for (const key of routeKeys(url)) {
      const fixture = routes.get(key);
      if (fixture !== undefined) {
        return nextResponse(key, fixture);
      }
    }

    return buildJsonResponse(fallbackFixture);
  };

  return {
    fetch: fetchFixture,
    calls,
    callsTo: (urlOrPath) =>
      calls.filter((call) => routeKeys(call.url).some((key) => key === urlOrPath)),
    setRoute: (urlOrPath, fixture) => {
      routes.set(urlOrPath, fixture);
    }
  };
}
