import { z } from "zod";
import { linkSchema, linksObjectSchema } from "./jsonApiLink.js";
import type {
  ErrorLinks,
  ErrorObject,
  ErrorSource,
  JsonApiDocument,
  JsonApiInfo,
  Relationship,
  Relationships,
  RelationshipsShape,
  Resource,
  ResourceIdentifier,
  ToManyRelationship,
  ToOneRelationship
} from "./jsonApiTypes.js";
import {
  collectExtensions,
  decodeNested,
  isObject,
  jsonObjectSchema,
  jsonValueSchema,
  recordOf,
  type JsonObject
} from "./jsonValue.js";
import { toPayload } from "./resourcePayload.js";

/** A structured decoder for resource objects; any zod schema whose output is a resource qualifies. */
export type ResourceDecoder<TAttributes = JsonObject, TRelationships extends RelationshipsShape = Relationships> = z.ZodType<
  Resource<TAttributes, TRelationships>,
  z.ZodTypeDef,
  unknown
>;

/** Optional member; an explicit `null` decodes the same as a missing member. */
const optional = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((value) => value ?? undefined);

/**
 * Decodes the members `shape` names and gathers every other member of the input into
 * `extensions`.
 */
const withExtensions = <TShape extends z.ZodRawShape>(shape: TShape) => {
  const members = z.object(shape);
  const known: ReadonlySet<string> = new Set(Object.keys(shape));
  return z.unknown().transform((value, ctx) =>
    Object.assign({}, decodeNested(members, value, ctx), {
      extensions: isObject(value) ? collectExtensions(value, known) : undefined
    })
  );
};

export const resourceIdentifierSchema = z
  .object({
    type: z.string(),
    id: optional(z.string()),
    lid: optional(z.string()),
    meta: optional(jsonObjectSchema)
  })
  .transform(({ type, id, lid, meta }): ResourceIdentifier => ({ type, id, localId: lid, meta }));

const relationshipEnvelope = withExtensions({
  links: optional(linksObjectSchema),
  data: jsonValueSchema.optional(),
  meta: optional(jsonObjectSchema)
});

export const relationshipSchema = relationshipEnvelope.transform(
  ({ links, data, meta, extensions }): Relationship => ({ links, data: toPayload(data), meta, extensions })
);

export const relationshipsSchema = recordOf(relationshipSchema);

export const toOneRelationship = <TIdentifier extends ResourceIdentifier>(
  identifier: z.ZodType<TIdentifier, z.ZodTypeDef, unknown>
) =>
  relationshipEnvelope.transform(({ links, data, meta, extensions }, ctx): ToOneRelationship<TIdentifier> => ({
    links,
    data: data === null || typeof data === "undefined" ? data : decodeNested(identifier, data, ctx, "data"),
    meta,
    extensions
  }));

export const toManyRelationship = <TIdentifier extends ResourceIdentifier>(
  identifier: z.ZodType<TIdentifier, z.ZodTypeDef, unknown>
) =>
  relationshipEnvelope.transform(({ links, data, meta, extensions }, ctx): ToManyRelationship<TIdentifier> => ({
    links,
    data: typeof data === "undefined" ? undefined : decodeNested(z.array(identifier), data, ctx, "data"),
    meta,
    extensions
  }));

export const toOneRelationshipSchema = toOneRelationship(resourceIdentifierSchema);

export const toManyRelationshipSchema = toManyRelationship(resourceIdentifierSchema);

const resourceEnvelope = z.object({
  type: z.string(),
  id: optional(z.string()),
  lid: optional(z.string()),
  attributes: z.unknown(),
  relationships: z.unknown(),
  links: optional(linksObjectSchema),
  meta: optional(jsonObjectSchema)
});

const buildResourceDecoder = <TAttributes, TRelationships extends RelationshipsShape>(
  attributes: z.ZodType<TAttributes, z.ZodTypeDef, unknown>,
  relationships: z.ZodType<TRelationships, z.ZodTypeDef, unknown>
): ResourceDecoder<TAttributes, TRelationships> =>
  resourceEnvelope.transform(
    (raw, ctx): Resource<TAttributes, TRelationships> => ({
      type: raw.type,
      id: raw.id,
      localId: raw.lid,
      attributes:
        raw.attributes === null || typeof raw.attributes === "undefined"
          ? undefined
          : decodeNested(attributes, raw.attributes, ctx, "attributes"),
      relationships:
        raw.relationships === null || typeof raw.relationships === "undefined"
          ? undefined
          : decodeNested(relationships, raw.relationships, ctx, "relationships"),
      links: raw.links,
      meta: raw.meta
    })
  );

/**
 * Builds a resource decoder. Without arguments attributes stay an open JSON object and
 * relationships an open map with erased `data`; pass schemas to type either region.
 *
 * @example
 * const articles = resourceDecoder(
 *   z.object({ title: z.string() }),
 *   z.object({ author: toOneRelationshipSchema })
 * );
 */
export function resourceDecoder(): ResourceDecoder;
export function resourceDecoder<TAttributes>(
  attributes: z.ZodType<TAttributes, z.ZodTypeDef, unknown>
): ResourceDecoder<TAttributes>;
export function resourceDecoder<TAttributes, TRelationships extends RelationshipsShape>(
  attributes: z.ZodType<TAttributes, z.ZodTypeDef, unknown>,
  relationships: z.ZodType<TRelationships, z.ZodTypeDef, unknown>
): ResourceDecoder<TAttributes, TRelationships>;
export function resourceDecoder(
  attributes: z.ZodType<unknown, z.ZodTypeDef, unknown> = jsonObjectSchema,
  relationships: z.ZodType<RelationshipsShape, z.ZodTypeDef, unknown> = relationshipsSchema
): ResourceDecoder<unknown, RelationshipsShape> {
  return buildResourceDecoder(attributes, relationships);
}

export const resourceSchema = resourceDecoder();

const errorLinksSchema = withExtensions({ about: linkSchema, type: linkSchema }).transform(
  ({ about, type, extensions }): ErrorLinks => ({ about, type, extensions })
);

const errorSourceSchema = z
  .object({
    pointer: optional(z.string()),
    parameter: optional(z.string()),
    header: optional(z.string())
  })
  .transform((source): ErrorSource => source);

export const errorObjectSchema = z
  .object({
    id: optional(z.string()),
    links: optional(errorLinksSchema),
    status: optional(z.string()),
    code: optional(z.string()),
    title: optional(z.string()),
    detail: optional(z.string()),
    source: optional(errorSourceSchema),
    meta: optional(jsonObjectSchema)
  })
  .transform((error): ErrorObject => error);

export const jsonApiInfoSchema = z
  .object({
    version: optional(z.string()),
    ext: optional(z.array(z.string())),
    profile: optional(z.array(z.string())),
    meta: optional(jsonObjectSchema)
  })
  .transform((info): JsonApiInfo => info);

export const documentSchema = withExtensions({
  jsonapi: optional(jsonApiInfoSchema),
  data: jsonValueSchema.optional(),
  errors: optional(z.array(errorObjectSchema)),
  links: optional(linksObjectSchema),
  included: optional(z.array(resourceSchema)),
  meta: optional(jsonObjectSchema)
}).transform(
  ({ jsonapi, data, errors, links, included, meta, extensions }): JsonApiDocument => ({
    jsonApi: jsonapi,
    data: toPayload(data),
    errors,
    links,
    included,
    meta,
    extensions
  })
);
