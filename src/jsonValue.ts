import { z } from "zod";
import { JsonApiSerializationError } from "./jsonApiErrors.js";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isObject(value) && Object.values(value).every(isJsonValue);
};

/**
 * JSON regions are checked, not rebuilt: the parsed value is passed through as is, so members
 * such as `"__proto__"` stay own data properties.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.custom<JsonValue>(isJsonValue, "Expected a JSON value");

export const jsonObjectSchema: z.ZodType<JsonObject> = z.custom<JsonObject>(
  (value) => isObject(value) && isJsonValue(value),
  "Expected a JSON object"
);

/** Sets `key` as an own data property, whatever its name. */
export const defineMember = <T>(target: Record<string, T>, key: string, value: T) => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Runs `schema` over `value` and reports its issues on `ctx`, so paths in the resulting ZodError
 * stay absolute. With a `member`, `value` sits at that member of the value `ctx` belongs to.
 */
export const decodeNested = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  ctx: z.RefinementCtx,
  member?: string
): T => {
  const path = typeof member === "undefined" ? ctx.path : [...ctx.path, member];
  const result = schema.safeParse(value, { path });
  if (result.success) return result.data;
  for (const issue of result.error.issues) {
    ctx.addIssue({ ...issue, path: issue.path.slice(ctx.path.length) });
  }
  return z.NEVER;
};

/** An object of arbitrary member names, each decoded by `schema`. */
export const recordOf = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
  z.unknown().transform((value, ctx): Record<string, T> => {
    if (!isObject(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.invalid_type,
        expected: z.ZodParsedType.object,
        received: z.getParsedType(value)
      });
      return z.NEVER;
    }
    const result: Record<string, T> = {};
    for (const [key, item] of Object.entries(value)) {
      defineMember(result, key, decodeNested(schema, item, ctx, key));
    }
    return result;
  });

/**
 * Converts a typed value into a JSON tree with the same rules as `JSON.stringify`: undefined
 * members are dropped, undefined array slots and non-finite numbers become null and objects with
 * a `toJSON` method (dates) are replaced by its result.
 */
export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === "undefined" ? null : toJsonValue(item)));
  }
  if (isObject(value)) {
    const toJSON = value.toJSON;
    if (typeof toJSON === "function") {
      return toJsonValue(toJSON.call(value));
    }
    return toJsonObject(value);
  }
  throw new JsonApiSerializationError(`A value of type ${typeof value} has no JSON representation`);
};

export const toJsonObject = (value: Record<string, unknown>): JsonObject => {
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "undefined") continue;
    defineMember(result, key, toJsonValue(item));
  }
  return result;
};

/**
 * Collects the members of `value` no schema names into an extension bag, or undefined when
 * there are none.
 */
export const collectExtensions = (value: Record<string, unknown>, known: ReadonlySet<string>) => {
  const extensions: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (known.has(key) || typeof item === "undefined") continue;
    defineMember(extensions, key, toJsonValue(item));
  }
  return Object.keys(extensions).length > 0 ? extensions : undefined;
};

export const compactObject = (value: Record<string, JsonValue | undefined>): JsonObject => {
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "undefined") defineMember(result, key, item);
  }
  return result;
};
