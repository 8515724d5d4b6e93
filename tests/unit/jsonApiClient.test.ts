import { z } from "zod";
import { describe, expect, it, vi } from "vitest";
import {
  JsonApiClient,
  readCollectionDocument,
  readJsonApiDocument,
  readSingleResourceDocument
} from "../../src/jsonApiClient.js";
import { JsonApiRequestError, MalformedLinkError } from "../../src/jsonApiErrors.js";
import { resourceDecoder, resourceSchema } from "../../src/jsonApiSchemas.js";

const BASE_URL = "https://api.example.com/v1";

const jsonApiResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/vnd.api+json", ...headers }
  });

const article = (id: string, title: string) => ({ type: "articles", id, attributes: { title } });

const createClient = (fetchMock: typeof fetch, options: { retryMax?: number; ext?: string[] } = {}) =>
  new JsonApiClient({
    baseUrl: BASE_URL,
    retryMax: options.retryMax ?? 2,
    retryBaseMs: 1,
    timeoutMs: 1000,
    ext: options.ext,
    headers: { Authorization: "Bearer test-secret" },
    fetch: fetchMock
  });

const capture = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
};

describe("jsonApiClient.ts", () => {
  describe("read helpers", () => {
    it("should yield no document for an empty or null body", async () => {
      expect(await readJsonApiDocument(new Response(""))).toBeUndefined();
      expect(await readJsonApiDocument(new Response("null"))).toBeUndefined();
    });

    it("should read a typed single resource", async () => {
      const decoder = resourceDecoder(z.object({ title: z.string() }));
      const document = await readSingleResourceDocument(jsonApiResponse({ data: article("1", "Hello") }), decoder);

      expect(document?.data?.attributes?.title).toBe("Hello");
    });

    it("should read a collection", async () => {
      const document = await readCollectionDocument(
        jsonApiResponse({ data: [article("1", "A"), article("2", "B")] }),
        resourceSchema
      );

      expect(document?.data?.map((item) => item.id)).toEqual(["1", "2"]);
    });

    it("should reject when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort(new Error("cancelled"));

      await expect(readJsonApiDocument(new Response('{"data":null}'), { signal: controller.signal })).rejects.toThrow(
        "cancelled"
      );
    });

    it("should cancel a pending body read on abort", async () => {
      let cancelReason: unknown;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"data":'));
        },
        cancel(reason) {
          cancelReason = reason;
        }
      });
      const controller = new AbortController();
      const reason = new Error("cancelled");

      const pending = readJsonApiDocument(new Response(body), { signal: controller.signal });
      controller.abort(reason);

      await expect(pending).rejects.toBe(reason);
      expect(cancelReason).toBe(reason);
    });

    it("should surface codec errors from the body", async () => {
      await expect(readJsonApiDocument(jsonApiResponse({ links: { self: 1 } }))).rejects.toBeInstanceOf(
        MalformedLinkError
      );
    });
  });

  describe("JsonApiClient", () => {
    it("should request relative paths against the base URL with JSON:API headers", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonApiResponse({ data: article("1", "Hello") }));
      const client = createClient(fetchMock);

      const document = await client.getResource("/articles/1", resourceSchema);

      expect(document?.data?.attributes).toEqual({ title: "Hello" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("https://api.example.com/v1/articles/1");
      expect(init?.method).toBe("GET");
      expect(init?.headers).toEqual({ Authorization: "Bearer test-secret", Accept: "application/vnd.api+json" });
      expect(init?.body).toBeUndefined();
    });

    it("should negotiate extensions through the Accept header", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonApiResponse({ data: [] }));
      const client = createClient(fetchMock, { ext: ["https://jsonapi.org/ext/atomic"] });

      await client.getDocument("articles");

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-secret",
        Accept: 'application/vnd.api+json; ext="https://jsonapi.org/ext/atomic"'
      });
    });

    it("should encode query parameters", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonApiResponse({ data: [] }));
      const client = createClient(fetchMock);

      const document = await client.getCollection("articles", resourceSchema, { query: { "page[size]": "2" } });

      expect(document?.data).toEqual([]);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.example.com/v1/articles?page%5Bsize%5D=2");
    });

    it("should retry server errors and then succeed", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonApiResponse({ errors: [{ status: "503" }] }, 503))
        .mockResolvedValueOnce(jsonApiResponse({ data: article("1", "Hello") }));
      const client = createClient(fetchMock);

      const document = await client.getResource("articles/1", resourceSchema);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(document?.data?.id).toBe("1");
    });

    it("should not retry client errors and keep the error document", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonApiResponse({ errors: [{ status: "404", title: "Not Found" }] }, 404));
      const client = createClient(fetchMock);

      const err = await capture(client.getDocument("articles/999"));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(JsonApiRequestError);
      if (err instanceof JsonApiRequestError) {
        expect(err.message).toBe("JSON:API GET articles/999 failed with status 404");
        expect(err.statusCode).toBe(404);
        expect(err.retryable).toBe(false);
        expect(err.document?.errors?.[0]?.title).toBe("Not Found");
      }
    });

    it("should wrap error bodies that are not JSON:API", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(new Response("Internal failure", { status: 500, headers: { "content-type": "text/plain" } }));
      const client = createClient(fetchMock, { retryMax: 0 });

      const err = await capture(client.getDocument("articles"));

      expect(err).toBeInstanceOf(JsonApiRequestError);
      if (err instanceof JsonApiRequestError) {
        expect(err.retryable).toBe(true);
        expect(err.document?.errors).toEqual([{ status: "500", detail: "Internal failure" }]);
      }
    });

    it("should retry network failures and report the cause", async () => {
      const failure = new TypeError("fetch failed");
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(failure);
      const client = createClient(fetchMock, { retryMax: 1 });

      const err = await capture(client.getDocument("/articles"));

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(err).toBeInstanceOf(JsonApiRequestError);
      if (err instanceof JsonApiRequestError) {
        expect(err.message).toBe("JSON:API GET /articles failed: fetch failed");
        expect(err.statusCode).toBeUndefined();
        expect(err.retryable).toBe(true);
        expect(err.cause).toBe(failure);
      }
    });

    it("should not retry once the caller aborts", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonApiResponse({ data: null }));
      const client = createClient(fetchMock);
      const controller = new AbortController();
      controller.abort(new Error("cancelled"));

      await expect(client.getDocument("articles", { signal: controller.signal })).rejects.toThrow("cancelled");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("should send documents with the JSON:API content type", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonApiResponse({ data: article("7", "Created") }, 201));
      const client = createClient(fetchMock);

      const response = await client.send("POST", "articles", {
        data: { type: "articles", localId: "tmp-1", attributes: { title: "Created" } }
      });

      expect(response.statusCode).toBe(201);
      expect(response.document?.data.kind).toBe("single");
      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-secret",
        Accept: "application/vnd.api+json",
        "Content-Type": "application/vnd.api+json"
      });
      expect(init?.body).toBe('{"data":{"type":"articles","lid":"tmp-1","attributes":{"title":"Created"}}}');
    });

    it("should follow next links and merge included resources", async () => {
      const pages: Record<string, unknown> = {
        "https://api.example.com/v1/articles": {
          data: [article("1", "A"), article("2", "B")],
          included: [{ type: "people", id: "9" }],
          links: { next: "https://api.example.com/v1/articles?page[number]=2" }
        },
        "https://api.example.com/v1/articles?page[number]=2": {
          data: [article("3", "C")],
          included: [{ type: "people", id: "9" }, { type: "people", id: "10" }],
          links: { prev: "https://api.example.com/v1/articles", next: null },
          meta: { total: 3 }
        }
      };
      const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (input) => {
        const body = pages[String(input)];
        return body ? jsonApiResponse(body) : jsonApiResponse({ errors: [{ status: "404" }] }, 404);
      });
      const client = createClient(fetchMock);

      const result = await client.collectPages("articles", resourceSchema);

      expect(result.pagesFetched).toBe(2);
      expect(result.data.map((item) => item.id)).toEqual(["1", "2", "3"]);
      expect(result.included?.map((item) => item.id)).toEqual(["9", "10"]);
      expect(result.meta).toEqual({ total: 3 });
    });

    it("should stop at a next link already visited", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
        jsonApiResponse({
          data: [article("1", "A")],
          links: { next: "https://api.example.com/v1/articles?page[number]=1" }
        })
      );
      const client = createClient(fetchMock);

      const result = await client.collectPages("articles", resourceSchema);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(result.pagesFetched).toBe(2);
    });

    it("should trim the result to maxItems", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () =>
        jsonApiResponse({
          data: [article("1", "A"), article("2", "B")],
          links: { next: "https://api.example.com/v1/articles?page[number]=2" }
        })
      );
      const client = createClient(fetchMock);

      const result = await client.collectPages("articles", resourceSchema, { maxItems: 1 });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.data).toHaveLength(1);
    });
  });
});
