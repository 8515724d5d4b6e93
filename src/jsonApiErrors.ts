import { ZodError } from "zod";
import type { JsonApiDocument } from "./jsonApiTypes.js";

export class JsonApiCodecError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

const formatPath = (path: ReadonlyArray<string | number>) =>
  path.length === 0 ? "$" : `$${path.map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`)).join("")}`;

/** A link member that is neither a string nor a link object, or a link object without `href`. */
export class MalformedLinkError extends JsonApiCodecError {
  constructor(
    public readonly reason: string,
    public readonly path: ReadonlyArray<string | number> = []
  ) {
    super(path.length > 0 ? `${reason} (at ${formatPath(path)})` : reason);
  }
}

export type PayloadKind = "absent" | "single" | "collection" | "scalar";

/** Projection asked for a single resource on array data, or for a collection on object data. */
export class ShapeMismatchError extends JsonApiCodecError {
  constructor(
    message: string,
    public readonly expected: "single" | "collection",
    public readonly actual: PayloadKind
  ) {
    super(message);
  }
}

export class JsonApiParseError extends JsonApiCodecError {}

export class JsonApiSerializationError extends JsonApiCodecError {}

export class InvalidMediaTypeError extends JsonApiCodecError {}

export class JsonApiRequestError extends JsonApiCodecError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly document?: JsonApiDocument,
    public readonly retryable = false,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export const normalizeJsonApiError = (err: unknown) => {
  if (err instanceof JsonApiRequestError) {
    return {
      name: err.name,
      message: err.message,
      statusCode: err.statusCode,
      errors: err.document?.errors,
      retryable: err.retryable
    };
  }

  if (err instanceof MalformedLinkError) {
    return { name: err.name, message: err.reason, path: formatPath(err.path) };
  }

  if (err instanceof ShapeMismatchError) {
    return { name: err.name, message: err.message, expected: err.expected, actual: err.actual };
  }

  if (err instanceof ZodError) {
    return {
      name: err.name,
      message: "Document does not match the expected structure",
      issues: err.issues.map((issue) => ({ path: formatPath(issue.path), message: issue.message }))
    };
  }

  return {
    name: err instanceof Error ? err.name : "Error",
    message: err instanceof Error ? err.message : String(err)
  };
};
