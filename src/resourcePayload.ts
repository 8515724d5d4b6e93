import type { PayloadKind } from "./jsonApiErrors.js";
import type { JsonApiDocument, ResourcePayload } from "./jsonApiTypes.js";
import type { JsonValue } from "./jsonValue.js";

export const ABSENT: ResourcePayload = Object.freeze({ kind: "absent" });

/** Tags a `data` member by its JSON shape. Nothing else is inspected. */
export const toPayload = (value: JsonValue | undefined): ResourcePayload => {
  if (typeof value === "undefined") return ABSENT;
  if (value === null) return { kind: "absent", raw: null };
  if (Array.isArray(value)) return { kind: "collection", raw: value };
  if (typeof value === "object") return { kind: "single", raw: value };
  return { kind: "scalar", raw: value };
};

/** The wire value of a payload, or undefined when the member should be omitted. */
export const payloadValue = (payload: ResourcePayload): JsonValue | undefined => payload.raw;

export const isResourcePayload = (value: unknown): value is ResourcePayload => {
  if (typeof value !== "object" || value === null || Array.isArray(value) || !("kind" in value)) return false;
  return (
    value.kind === "absent" || value.kind === "single" || value.kind === "collection" || value.kind === "scalar"
  );
};

/** The payload kind of erased `data`, or of the `data` of a typed document. */
export const dataKind = (data: unknown): PayloadKind => {
  if (isResourcePayload(data)) return data.kind;
  if (data === null || typeof data === "undefined") return "absent";
  if (Array.isArray(data)) return "collection";
  return typeof data === "object" ? "single" : "scalar";
};

export const hasSingleResource = (document: { data?: unknown }) => dataKind(document.data) === "single";

export const hasCollectionResource = (document: { data?: unknown }) => dataKind(document.data) === "collection";

export const hasErrors = (document: Pick<JsonApiDocument, "errors">) =>
  typeof document.errors !== "undefined" && document.errors.length > 0;
