import assert from "node:assert/strict";
import test from "node:test";

import {
  HttpStatusError,
  NetworkError,
  PollenApiClient,
  RateLimitOrBlockedError,
  UnsupportedLocationError,
  UpstreamFormatError,
  parseRetryAfter,
  probeLocation,
  type PollenLocation
} from "../../src/connectors/pollen/index.js";
import { jsonResponse, loadFixture } from "../helpers.js";

const NOW = new Date("2026-04-14T10:00:00.000Z");

const utrecht: PollenLocation = {
  name: "utrecht",
  region: "nl",
  query: { by: "coordinates", latitude: 52.09, longitude: 5.12 }
};

const boston: PollenLocation = {
  name: "boston",
  region: "us",
  query: { by: "postal", postalCode: "02108" }
};

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

function createFetch(respond: () => Response | Promise<Response>): {
  fetchImpl: typeof fetch;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: input instanceof Request ? input.url : input.toString(), init });
    return respond();
  };
  return { fetchImpl, calls };
}

/** Never settles unless the request signal aborts. */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal?.addEventListener(
      "abort",
      () => {
        reject(new Error("aborted"));
      },
      { once: true }
    );
  });

test("posts coordinates to the current endpoint and decodes the forecast", async () => {
  const fixture = loadFixture("current-nl.json");
  const { fetchImpl, calls } = createFetch(() => jsonResponse(fixture));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  const result = await client.fetch(utrecht);

  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "https://www.kleenex.nl/api/sitecore/Pollen/GetPollenContent");
  assert.equal(calls[0]?.init?.method, "POST");
  assert.equal(calls[0]?.init?.body, "lat=52.09&lng=5.12");
  assert.deepEqual(calls[0]?.init?.headers, {
    accept: "application/json",
    "user-agent": "pollen-radar/1.0",
    "content-type": "application/x-www-form-urlencoded; charset=UTF-8"
  });

  assert.equal(result.family, "current");
  assert.equal(result.fetchedAt, NOW);
  assert.deepEqual(result.raw, fixture);
  assert.equal(result.forecast.tree.length, 5);
  assert.equal(result.forecast.tree[0]?.count, 12);
  assert.equal(result.forecast.tree[0]?.level, "low");
});

test("sends a city lookup as a form field", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse(loadFixture("current-nl.json")));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW, userAgent: "pollen-test/2.0" });

  await client.fetch({ name: "london", region: "uk", query: { by: "city", city: " London " } });

  assert.equal(calls[0]?.url, "https://www.kleenex.co.uk/api/sitecore/Pollen/GetPollenContent");
  assert.equal(calls[0]?.init?.body, "city=London");
  assert.deepEqual(calls[0]?.init?.headers, {
    accept: "application/json",
    "user-agent": "pollen-test/2.0",
    "content-type": "application/x-www-form-urlencoded; charset=UTF-8"
  });
});

test("queries the legacy endpoint by ZIP code and derives levels", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse(loadFixture("legacy-us.json")));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  const result = await client.fetch(boston);

  assert.equal(
    calls[0]?.url,
    "https://www.kleenex.com/api/sitecore/Pollen/GetPollenData?zip=02108"
  );
  assert.equal(calls[0]?.init?.method, "GET");
  assert.equal(calls[0]?.init?.body, undefined);
  assert.equal(result.family, "legacy");
  assert.equal(result.forecast.tree[0]?.date, "2026-04-14");
  assert.equal(result.forecast.tree[0]?.level, "low");
  assert.equal(result.forecast.tree[1]?.level, "high");
  assert.equal(result.forecast.weed[0]?.level, null);
});

test("uses a configured base URL override", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse(loadFixture("legacy-us.json")));
  const client = new PollenApiClient({
    fetchImpl,
    now: () => NOW,
    baseUrls: { us: "http://localhost:8080/" }
  });

  await client.fetch({
    name: "boston",
    region: "us",
    query: { by: "coordinates", latitude: 42.36, longitude: -71.06 }
  });

  assert.equal(
    calls[0]?.url,
    "http://localhost:8080/api/sitecore/Pollen/GetPollenData?lat=42.36&lng=-71.06"
  );
});

test("maps server errors to retryable HttpStatusError", async () => {
  const { fetchImpl } = createFetch(() => new Response("upstream down", { status: 502 }));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof HttpStatusError);
    assert.equal(error.kind, "http_status");
    assert.equal(error.status, 502);
    assert.equal(error.body, "upstream down");
    assert.equal(error.retryable, true);
    return true;
  });
});

test("client errors are not retryable", async () => {
  const { fetchImpl } = createFetch(() => new Response("not found", { status: 404 }));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof HttpStatusError);
    assert.equal(error.status, 404);
    assert.equal(error.retryable, false);
    return true;
  });
});

test("maps 429 to RateLimitOrBlockedError with Retry-After", async () => {
  const { fetchImpl } = createFetch(
    () => new Response("slow down", { status: 429, headers: { "retry-after": "120" } })
  );
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof RateLimitOrBlockedError);
    assert.equal(error.kind, "rate_limited");
    assert.equal(error.status, 429);
    assert.equal(error.retryAfterMs, 120_000);
    assert.equal(error.retryable, true);
    return true;
  });
});

test("maps 403 to RateLimitOrBlockedError", async () => {
  const { fetchImpl } = createFetch(() => new Response("blocked", { status: 403 }));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof RateLimitOrBlockedError);
    assert.equal(error.status, 403);
    assert.equal(error.retryAfterMs, undefined);
    return true;
  });
});

test("malformed JSON raises UpstreamFormatError carrying the raw body", async () => {
  const { fetchImpl } = createFetch(() => new Response("{not json", { status: 200 }));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof UpstreamFormatError);
    assert.equal(error.kind, "upstream_format");
    assert.equal(error.retryable, false);
    assert.equal(error.raw, "{not json");
    return true;
  });
});

test("schema mismatches carry the decoded payload", async () => {
  const payload = { days: [] };
  const { fetchImpl } = createFetch(() => jsonResponse(payload));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof UpstreamFormatError);
    assert.deepEqual(error.raw, payload);
    assert.match(error.message, /Forecast does not contain 5 contiguous days/);
    return true;
  });
});

test("transport failures become NetworkError", async () => {
  const fetchImpl: typeof fetch = async () => {
    throw new TypeError("fetch failed");
  };
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof NetworkError);
    assert.equal(error.kind, "network");
    assert.equal(error.timedOut, false);
    assert.equal(error.message, "Pollen API request failed: fetch failed");
    return true;
  });
});

test("requests that exceed the timeout are aborted", async () => {
  const client = new PollenApiClient({ fetchImpl: hangingFetch, now: () => NOW, requestTimeoutMs: 20 });

  await assert.rejects(client.fetch(utrecht), (error: unknown) => {
    assert.ok(error instanceof NetworkError);
    assert.equal(error.timedOut, true);
    assert.equal(error.message, "Pollen API request timed out after 20ms");
    return true;
  });
});

test("a caller abort cancels the request", async () => {
  const client = new PollenApiClient({ fetchImpl: hangingFetch, now: () => NOW });
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(client.fetch(utrecht, { signal: controller.signal }), (error: unknown) => {
    assert.ok(error instanceof NetworkError);
    assert.equal(error.timedOut, false);
    assert.equal(error.message, "Pollen API request was aborted");
    return true;
  });
});

test("unsupported locations fail before any request", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse(loadFixture("current-nl.json")));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });
  const location: PollenLocation = {
    name: "amsterdam",
    region: "nl",
    query: { by: "postal", postalCode: "10115" }
  };

  await assert.rejects(client.fetch(location), UnsupportedLocationError);
  await assert.rejects(probeLocation(client, location), UnsupportedLocationError);
  assert.equal(calls.length, 0);
});

test("probeLocation returns the first forecast for a usable location", async () => {
  const { fetchImpl, calls } = createFetch(() => jsonResponse(loadFixture("legacy-us.json")));
  const client = new PollenApiClient({ fetchImpl, now: () => NOW });

  const result = await probeLocation(client, boston);

  assert.equal(calls.length, 1);
  assert.equal(result.forecast.grass.length, 5);
});

test("rejects a non-positive request timeout", () => {
  assert.throws(
    () => new PollenApiClient({ requestTimeoutMs: 0 }),
    /requestTimeoutMs must be a positive integer/
  );
});

test("parses Retry-After seconds and HTTP dates", () => {
  assert.equal(parseRetryAfter("30", NOW), 30_000);
  assert.equal(parseRetryAfter("Tue, 14 Apr 2026 10:02:00 GMT", NOW), 120_000);
  assert.equal(parseRetryAfter("Tue, 14 Apr 2026 09:00:00 GMT", NOW), 0);
  assert.equal(parseRetryAfter("soon", NOW), undefined);
  assert.equal(parseRetryAfter(null, NOW), undefined);
});
