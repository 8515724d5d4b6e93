import { ZodError, type z } from "zod";
import { config } from "./config.js";
import {
  encodeDocument,
  parseDocument,
  toCollectionDocument,
  toSingleResourceDocument,
  type SerializableDocument
} from "./jsonApiDocument.js";
import { JsonApiCodecError, JsonApiRequestError, normalizeJsonApiError } from "./jsonApiErrors.js";
import type {
  CollectionResourceDocument,
  JsonApiDocument,
  LinksObject,
  Resource,
  SingleResourceDocument
} from "./jsonApiTypes.js";
import type { JsonObject } from "./jsonValue.js";
import { logger } from "./logger.js";
import { formatMediaType } from "./mediaType.js";
import { ABSENT } from "./resourcePayload.js";

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ReadDocumentOptions = {
  signal?: AbortSignal;
};

const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new Error("The operation was aborted");

/** Reads the body as text; an abort cancels the stream and rejects with the signal's reason. */
const readBody = async (response: Response, signal?: AbortSignal): Promise<string> => {
  if (!signal) return response.text();
  if (signal.aborted) {
    await response.body?.cancel(signal.reason);
    throw abortReason(signal);
  }
  if (!response.body) return "";

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let cancelled: Promise<void> | undefined;
  const onAbort = () => {
    cancelled = reader.cancel(signal.reason);
  };
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    let text = "";
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    await cancelled;
    if (signal.aborted) throw abortReason(signal);
    return text + decoder.decode();
  } finally {
    signal.removeEventListener("abort", onAbort);
    reader.releaseLock();
  }
};

/** Reads a response body as a document; an empty or `null` body yields undefined. */
export const readJsonApiDocument = async (
  response: Response,
  options?: ReadDocumentOptions
): Promise<JsonApiDocument | undefined> => {
  const text = await readBody(response, options?.signal);
  if (text.trim().length === 0) return undefined;
  return parseDocument(text);
};

export const readSingleResourceDocument = async <TResource>(
  response: Response,
  decoder: Decoder<TResource>,
  options?: ReadDocumentOptions
): Promise<SingleResourceDocument<TResource> | undefined> => {
  const document = await readJsonApiDocument(response, options);
  return document && toSingleResourceDocument(document, decoder);
};

export const readCollectionDocument = async <TResource>(
  response: Response,
  decoder: Decoder<TResource>,
  options?: ReadDocumentOptions
): Promise<CollectionResourceDocument<TResource> | undefined> => {
  const document = await readJsonApiDocument(response, options);
  return document && toCollectionDocument(document, decoder);
};

export type JsonApiClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  retryMax?: number;
  retryBaseMs?: number;
  maxPages?: number;
  /** Extension URIs to negotiate through the `ext` media type parameter. */
  ext?: string[];
  /** Profile URIs to negotiate through the `profile` media type parameter. */
  profile?: string[];
  headers?: Record<string, string>;
  fetch?: typeof fetch;
};

export type RequestOptions = {
  query?: Record<string, string>;
  body?: SerializableDocument;
  signal?: AbortSignal;
  retryMax?: number;
};

export type JsonApiResponse = {
  statusCode: number;
  headers: Headers;
  document?: JsonApiDocument;
};

export type CollectedPages<TResource> = {
  data: TResource[];
  included?: Resource[];
  links?: LinksObject;
  meta?: JsonObject;
  pagesFetched: number;
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const resourceKey = (resource: Resource) => `${resource.type}:${resource.id ?? resource.localId ?? ""}`;

const mergeIncludedResources = (base: Resource[] | undefined, incoming: Resource[] | undefined) => {
  if (!base?.length && !incoming?.length) return undefined;
  const map = new Map<string, Resource>();
  for (const item of base ?? []) {
    map.set(resourceKey(item), item);
  }
  for (const item of incoming ?? []) {
    map.set(resourceKey(item), item);
  }
  return Array.from(map.values());
};

const parseRetryAfter = (header: string | null) => {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
};

export class JsonApiClient {
  private readonly baseUrl?: string;
  private readonly timeoutMs: number;
  private readonly retryMax: number;
  private readonly retryBaseMs: number;
  private readonly maxPages: number;
  private readonly mediaType: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: JsonApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.baseUrl)?.replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
    this.retryMax = options.retryMax ?? config.retryMax;
    this.retryBaseMs = options.retryBaseMs ?? config.retryBaseMs;
    this.maxPages = options.maxPages ?? config.maxPages;
    this.mediaType = formatMediaType({ ext: options.ext, profile: options.profile });
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async getDocument(path: string, options?: Omit<RequestOptions, "body">) {
    const response = await this.request("GET", path, options);
    return response.document;
  }

  async getResource<TResource>(path: string, decoder: Decoder<TResource>, options?: Omit<RequestOptions, "body">) {
    const document = await this.getDocument(path, options);
    return document && toSingleResourceDocument(document, decoder);
  }

  async getCollection<TResource>(path: string, decoder: Decoder<TResource>, options?: Omit<RequestOptions, "body">) {
    const document = await this.getDocument(path, options);
    return document && toCollectionDocument(document, decoder);
  }

  /**
   * Fetches a collection and every page reachable through `links.next`, stopping at a link
   * already visited or after `maxPages` pages.
   */
  async collectPages<TResource>(
    path: string,
    decoder: Decoder<TResource>,
    options?: Omit<RequestOptions, "body"> & { maxPages?: number; maxItems?: number }
  ): Promise<CollectedPages<TResource>> {
    const maxPages = options?.maxPages ?? this.maxPages;
    const maxItems = options?.maxItems && options.maxItems > 0 ? options.maxItems : undefined;

    const first = await this.getCollection(path, decoder, options);
    let data = first?.data ?? [];
    let included = first?.included;
    let links = first?.links;
    let meta = first?.meta;
    let pagesFetched = 1;
    const visitedNext = new Set<string>();
    let nextLink = first?.links?.next?.href;

    while (nextLink && pagesFetched < maxPages && (!maxItems || data.length < maxItems)) {
      if (visitedNext.has(nextLink)) break;
      visitedNext.add(nextLink);

      const next = await this.getCollection(nextLink, decoder, { signal: options?.signal, retryMax: options?.retryMax });
      data = data.concat(next?.data ?? []);
      included = mergeIncludedResources(included, next?.included);
      links = next?.links ?? links;
      meta = next?.meta ?? meta;
      pagesFetched += 1;

      nextLink = next?.links?.next?.href;
    }

    if (maxItems && data.length > maxItems) {
      data = data.slice(0, maxItems);
    }

    return { data, included, links, meta, pagesFetched };
  }

  async send(method: "POST" | "PATCH" | "DELETE", path: string, body?: SerializableDocument, options?: RequestOptions) {
    return this.request(method, path, { ...options, body });
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<JsonApiResponse> {
    const url = this.buildUrl(path, options.query);
    const retryMax = options.retryMax ?? this.retryMax;

    let attempt = 0;
    while (true) {
      try {
        const response = await this.doRequest(method, url, options);

        if (response.ok) {
          return { statusCode: response.statusCode, headers: response.headers, document: response.document };
        }

        const retryable = response.statusCode === 429 || response.statusCode >= 500;
        if (retryable && attempt < retryMax) {
          attempt += 1;
          logger.warn({ method, path, statusCode: response.statusCode, attempt }, "Retrying JSON:API request");
          await sleep(this.backoffMs(attempt, response.retryAfterMs));
          continue;
        }

        throw new JsonApiRequestError(
          `JSON:API ${method} ${path} failed with status ${response.statusCode}`,
          response.statusCode,
          response.document,
          retryable
        );
      } catch (err) {
        if (err instanceof JsonApiCodecError || err instanceof ZodError || options.signal?.aborted) {
          logger.debug({ method, path, err: normalizeJsonApiError(err) }, "JSON:API request failed");
          throw err;
        }

        const retryable = true;
        if (attempt < retryMax) {
          attempt += 1;
          logger.warn({ method, path, attempt, err: normalizeJsonApiError(err) }, "Retrying JSON:API request");
          await sleep(this.backoffMs(attempt));
          continue;
        }

        throw new JsonApiRequestError(
          `JSON:API ${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
          undefined,
          undefined,
          retryable,
          { cause: err }
        );
      }
    }
  }

  private backoffMs(attempt: number, retryAfterMs?: number) {
    if (retryAfterMs && retryAfterMs > 0) {
      return retryAfterMs;
    }
    const exp = this.retryBaseMs * Math.pow(2, attempt - 1);
    const jitter = Math.floor(Math.random() * Math.min(150, this.retryBaseMs));
    return exp + jitter;
  }

  private async doRequest(method: string, url: string, options: RequestOptions) {
    const headers: Record<string, string> = {
      ...this.headers,
      Accept: this.mediaType
    };

    if (options.body) {
      headers["Content-Type"] = this.mediaType;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) onAbort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body ? JSON.stringify(encodeDocument(options.body)) : undefined,
        signal: controller.signal
      });

      const text = await readBody(response, controller.signal);
      return {
        ok: response.ok,
        statusCode: response.status,
        headers: response.headers,
        document: this.parseBody(text, response),
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after"))
      };
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Error responses that are not JSON:API keep their text as the detail of a single error. */
  private parseBody(text: string, response: Response): JsonApiDocument | undefined {
    if (text.trim().length === 0) return undefined;
    if (response.ok) return parseDocument(text);

    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.toLowerCase().includes("json")) {
      try {
        return parseDocument(text);
      } catch (err) {
        logger.debug({ err: normalizeJsonApiError(err) }, "Error response body is not a JSON:API document");
      }
    }
    return { data: ABSENT, errors: [{ status: String(response.status), detail: text }] };
  }

  private buildUrl(path: string, query?: Record<string, string>) {
    let url: URL;
    if (path.startsWith("http://") || path.startsWith("https://")) {
      url = new URL(path);
    } else if (this.baseUrl) {
      url = new URL(path.replace(/^\/+/, ""), `${this.baseUrl}/`);
    } else {
      throw new JsonApiRequestError(`A base URL is required to request the relative path ${path}`);
    }

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }

    return url.toString();
  }
}
