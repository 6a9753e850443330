import test from "node:test";
import assert from "node:assert/strict";
import { createCatalogClient } from "./library.js";

const logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

function stubFetch(handler: (url: URL) => Response, calls: URL[]): typeof fetch {
  return async (input) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    calls.push(url);
    return handler(url);
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function docs(...titles: string[]) {
  return {
    response: {
      docs: titles.map((bookname, i) => ({
        doc: { bookname, authors: "Author", isbn13: `978000000000${i}`, publication_year: 2020 },
      })),
    },
  };
}

test("searchByTitle sends the catalog query parameters", async () => {
  const calls: URL[] = [];
  const client = createCatalogClient({
    apiKey: "test-key",
    baseUrl: "http://catalog.test/api/",
    fetch: stubFetch(() => json(docs("Book A")), calls),
    logger,
  });

  const result = await client.searchByTitle("Book A", 5);

  assert.equal(calls.length, 1);
  assert.equal(calls[0].pathname, "/api/srchBooks");
  assert.equal(calls[0].searchParams.get("authKey"), "test-key");
  assert.equal(calls[0].searchParams.get("title"), "Book A");
  assert.equal(calls[0].searchParams.get("pageSize"), "5");
  assert.equal(calls[0].searchParams.get("format"), "json");
  assert.deepEqual(result, [
    {
      isbn13: "9780000000000",
      bookname: "Book A",
      authors: "Author",
      publisher: undefined,
      publicationYear: "2020",
    },
  ]);
});

test("searchByTitle retries once without whitespace", async () => {
  const calls: URL[] = [];
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: stubFetch(
      (url) => (url.searchParams.get("title") === "해리포터와마법사의돌" ? json(docs("해리포터와 마법사의 돌")) : json(docs())),
      calls
    ),
    logger,
  });

  const result = await client.searchByTitle("해리포터와 마법사의 돌", 1);

  assert.deepEqual(
    calls.map((url) => url.searchParams.get("title")),
    ["해리포터와 마법사의 돌", "해리포터와마법사의돌"]
  );
  assert.equal(result.length, 1);
  assert.equal(result[0].bookname, "해리포터와 마법사의 돌");
});

test("searchByTitle does not repeat a title that has no whitespace", async () => {
  const calls: URL[] = [];
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: stubFetch(() => json(docs()), calls),
    logger,
  });

  assert.deepEqual(await client.searchByTitle("Nothing"), []);
  assert.equal(calls.length, 1);
});

test("searchByTitle treats transport and decode failures as no results", async () => {
  const calls: URL[] = [];
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: stubFetch((url) => (url.searchParams.get("title") === "A B" ? json({}, 500) : json({ response: { docs: "oops" } })), calls),
    logger,
  });

  assert.deepEqual(await client.searchByTitle("A B"), []);
  assert.equal(calls.length, 2);
});

test("checkAvailability maps Y/N flags", async () => {
  const calls: URL[] = [];
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: stubFetch(() => json({ response: { result: { hasBook: "Y", loanAvailable: "N" } } }), calls),
    logger,
  });

  const result = await client.checkAvailability("141652", "9780000000002");

  assert.deepEqual(result, { hasBook: true, loanAvailable: false });
  assert.equal(calls[0].pathname, "/api/bookExist");
  assert.equal(calls[0].searchParams.get("libCode"), "141652");
  assert.equal(calls[0].searchParams.get("isbn13"), "9780000000002");
});

test("checkAvailability returns null for a missing result", async () => {
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: stubFetch(() => json({ response: { error: "bad key" } }), []),
    logger,
  });

  assert.equal(await client.checkAvailability("141652", "9780000000002"), null);
});

test("checkAvailability returns null when the request throws", async () => {
  const client = createCatalogClient({
    apiKey: "test-key",
    fetch: async () => {
      throw new TypeError("fetch failed");
    },
    logger,
  });

  assert.equal(await client.checkAvailability("141652", "9780000000002"), null);
});
