import { z } from "zod";
import { InvalidMediaTypeError } from "./jsonApiErrors.js";

export const JSON_API_MEDIA_TYPE = "application/vnd.api+json";

const INVALID_MEDIA_TYPE = "Invalid media type; see https://jsonapi.org/format/#jsonapi-media-type";
const INVALID_PARAMETERS =
  "Only `ext` and `profile` parameters are allowed; see https://jsonapi.org/format/#media-type-parameter-rules";

const uriSchema = z
  .string()
  .min(1, "URI cannot be empty")
  .regex(/^\S+$/, "URI cannot contain whitespace");

const mediaTypeOptionsSchema = z.object({
  ext: z.array(uriSchema).default([]),
  profile: z.array(uriSchema).default([]),
  q: z.number().min(0).max(1).optional()
});

export type MediaTypeOptions = z.input<typeof mediaTypeOptionsSchema>;

export type MediaTypeParameters = z.output<typeof mediaTypeOptionsSchema>;

const formatQuality = (q: number) => String(Number(q.toFixed(3)));

/**
 * Formats a JSON:API media type for `Accept` or `Content-Type`, e.g.
 * `application/vnd.api+json; ext="https://example.com/ext/a"; q=0.9`.
 */
export const formatMediaType = (options: MediaTypeOptions = {}) => {
  const parsed = mediaTypeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidMediaTypeError(
      `Invalid media type parameters: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`
    );
  }

  const { ext, profile, q } = parsed.data;
  const parts = [JSON_API_MEDIA_TYPE];
  if (ext.length > 0) parts.push(`ext="${ext.join(" ")}"`);
  if (profile.length > 0) parts.push(`profile="${profile.join(" ")}"`);
  if (typeof q !== "undefined") parts.push(`q=${formatQuality(q)}`);
  return parts.join("; ");
};

const splitParameters = (value: string) => {
  const parts: string[] = [];
  let current = "";
  let quoted = false;
  for (const char of value) {
    if (char === '"') quoted = !quoted;
    if (char === ";" && !quoted) {
      parts.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts.map((part) => part.trim());
};

const unquote = (value: string) =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;

const splitUris = (value: string) => unquote(value).split(/\s+/).filter(Boolean);

/** Reads one media range of an `Accept` or `Content-Type` header. */
export const parseMediaType = (header: string): MediaTypeParameters => {
  const [mediaType = "", ...parameters] = splitParameters(header);
  if (mediaType.toLowerCase() !== JSON_API_MEDIA_TYPE) {
    throw new InvalidMediaTypeError(INVALID_MEDIA_TYPE);
  }

  const result: MediaTypeParameters = { ext: [], profile: [] };
  for (const parameter of parameters) {
    if (parameter.length === 0) continue;
    const separator = parameter.indexOf("=");
    const name = (separator === -1 ? parameter : parameter.slice(0, separator)).trim().toLowerCase();
    const value = separator === -1 ? "" : parameter.slice(separator + 1).trim();

    switch (name) {
      case "ext":
        result.ext = splitUris(value);
        break;
      case "profile":
        result.profile = splitUris(value);
        break;
      case "q": {
        const q = Number(unquote(value));
        if (value.length === 0 || !Number.isFinite(q) || q < 0 || q > 1) {
          throw new InvalidMediaTypeError(`Invalid quality value "${value}"`);
        }
        result.q = q;
        break;
      }
      default:
        throw new InvalidMediaTypeError(INVALID_PARAMETERS);
    }
  }
  return result;
};
