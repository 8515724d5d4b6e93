import { z } from "zod";
import { JsonApiParseError, ShapeMismatchError } from "./jsonApiErrors.js";
import { encodeLinks, encodeOptionalLink } from "./jsonApiLink.js";
import { documentSchema, resourceSchema } from "./jsonApiSchemas.js";
import type {
  CollectionResourceDocument,
  ErrorObject,
  JsonApiDocument,
  JsonApiInfo,
  Relationship,
  RelationshipData,
  RelationshipsShape,
  Resource,
  ResourceIdentifier,
  ResourcePayload,
  SingleResourceDocument
} from "./jsonApiTypes.js";
import { compactObject, defineMember, toJsonValue, type JsonObject, type JsonValue } from "./jsonValue.js";
import { isResourcePayload, payloadValue } from "./resourcePayload.js";

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Any resource, weakly or strongly typed, as accepted by the encoders. */
export type AnyResource = Resource<unknown, RelationshipsShape>;

export type SerializableDocument =
  | JsonApiDocument
  | SingleResourceDocument<AnyResource>
  | CollectionResourceDocument<AnyResource>;

const SINGLE_SHAPE_MISMATCH = "data is not an object; use the collection projection";
const COLLECTION_SHAPE_MISMATCH = "data is not an array; use the single projection";

const resourceCollectionSchema = z.array(resourceSchema);

const parseJsonText = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new JsonApiParseError(`Document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err
    });
  }
};

/**
 * Parses a document keeping `data` erased. A literal `null` yields no document; malformed JSON
 * throws JsonApiParseError, a malformed link MalformedLinkError and any other structural
 * problem the ZodError of the failing schema.
 */
export const parseDocument = (text: string): JsonApiDocument | undefined => {
  const value = parseJsonText(text);
  if (value === null) return undefined;
  return documentSchema.parse(value);
};

export function projectSingle(payload: ResourcePayload): Resource | undefined;
export function projectSingle<TResource>(payload: ResourcePayload, decoder: Decoder<TResource>): TResource | undefined;
export function projectSingle<TResource>(
  payload: ResourcePayload,
  decoder?: Decoder<TResource>
): TResource | Resource | undefined {
  switch (payload.kind) {
    case "absent":
      return undefined;
    case "single":
      return decoder ? decoder.parse(payload.raw) : resourceSchema.parse(payload.raw);
    default:
      throw new ShapeMismatchError(SINGLE_SHAPE_MISMATCH, "single", payload.kind);
  }
}

export function projectCollection(payload: ResourcePayload): Resource[] | undefined;
export function projectCollection<TResource>(
  payload: ResourcePayload,
  decoder: Decoder<TResource>
): TResource[] | undefined;
export function projectCollection<TResource>(
  payload: ResourcePayload,
  decoder?: Decoder<TResource>
): TResource[] | Resource[] | undefined {
  switch (payload.kind) {
    case "absent":
      return undefined;
    case "collection":
      return decoder ? z.array(decoder).parse(payload.raw) : resourceCollectionSchema.parse(payload.raw);
    default:
      throw new ShapeMismatchError(COLLECTION_SHAPE_MISMATCH, "collection", payload.kind);
  }
}

export function getResource(document: JsonApiDocument): Resource | undefined;
export function getResource<TResource>(document: JsonApiDocument, decoder: Decoder<TResource>): TResource | undefined;
export function getResource<TResource>(document: JsonApiDocument, decoder?: Decoder<TResource>) {
  return decoder ? projectSingle(document.data, decoder) : projectSingle(document.data);
}

export function getResourceCollection(document: JsonApiDocument): Resource[] | undefined;
export function getResourceCollection<TResource>(
  document: JsonApiDocument,
  decoder: Decoder<TResource>
): TResource[] | undefined;
export function getResourceCollection<TResource>(document: JsonApiDocument, decoder?: Decoder<TResource>) {
  return decoder ? projectCollection(document.data, decoder) : projectCollection(document.data);
}

export function toSingleResourceDocument(document: JsonApiDocument): SingleResourceDocument<Resource>;
export function toSingleResourceDocument<TResource>(
  document: JsonApiDocument,
  decoder: Decoder<TResource>
): SingleResourceDocument<TResource>;
export function toSingleResourceDocument<TResource>(
  document: JsonApiDocument,
  decoder?: Decoder<TResource>
): SingleResourceDocument<TResource | Resource> {
  const { data, ...members } = document;
  if (data.kind === "absent") return { ...members, data: data.raw };
  return { ...members, data: decoder ? projectSingle(data, decoder) : projectSingle(data) };
}

export function toCollectionDocument(document: JsonApiDocument): CollectionResourceDocument<Resource>;
export function toCollectionDocument<TResource>(
  document: JsonApiDocument,
  decoder: Decoder<TResource>
): CollectionResourceDocument<TResource>;
export function toCollectionDocument<TResource>(
  document: JsonApiDocument,
  decoder?: Decoder<TResource>
): CollectionResourceDocument<TResource> | CollectionResourceDocument<Resource> {
  const { data, ...members } = document;
  return decoder ? { ...members, data: projectCollection(data, decoder) } : { ...members, data: projectCollection(data) };
}

export function parseSingleDocument(text: string): SingleResourceDocument<Resource> | undefined;
export function parseSingleDocument<TResource>(
  text: string,
  decoder: Decoder<TResource>
): SingleResourceDocument<TResource> | undefined;
export function parseSingleDocument<TResource>(text: string, decoder?: Decoder<TResource>) {
  const document = parseDocument(text);
  if (!document) return undefined;
  return decoder ? toSingleResourceDocument(document, decoder) : toSingleResourceDocument(document);
}

export function parseCollectionDocument(text: string): CollectionResourceDocument<Resource> | undefined;
export function parseCollectionDocument<TResource>(
  text: string,
  decoder: Decoder<TResource>
): CollectionResourceDocument<TResource> | undefined;
export function parseCollectionDocument<TResource>(text: string, decoder?: Decoder<TResource>) {
  const document = parseDocument(text);
  if (!document) return undefined;
  return decoder ? toCollectionDocument(document, decoder) : toCollectionDocument(document);
}

export const encodeResourceIdentifier = (identifier: ResourceIdentifier): JsonObject =>
  compactObject({
    type: identifier.type,
    id: identifier.id,
    lid: identifier.localId,
    meta: identifier.meta
  });

const encodeRelationshipData = (data: RelationshipData | undefined): JsonValue | undefined => {
  if (typeof data === "undefined") return undefined;
  if (data === null) return null;
  if (Array.isArray(data)) return data.map(encodeResourceIdentifier);
  if (isResourcePayload(data)) return payloadValue(data);
  return encodeResourceIdentifier(data);
};

export const encodeRelationship = (relationship: Relationship<RelationshipData>): JsonObject => ({
  ...compactObject({
    links: relationship.links && encodeLinks(relationship.links),
    data: encodeRelationshipData(relationship.data),
    meta: relationship.meta
  }),
  ...relationship.extensions
});

const encodeRelationships = (relationships: RelationshipsShape): JsonObject => {
  const encoded: JsonObject = {};
  for (const [name, relationship] of Object.entries(relationships)) {
    if (relationship) defineMember(encoded, name, encodeRelationship(relationship));
  }
  return encoded;
};

export const encodeResource = (resource: AnyResource): JsonObject =>
  compactObject({
    type: resource.type,
    id: resource.id,
    lid: resource.localId,
    attributes: typeof resource.attributes === "undefined" ? undefined : toJsonValue(resource.attributes),
    relationships: resource.relationships && encodeRelationships(resource.relationships),
    links: resource.links && encodeLinks(resource.links),
    meta: resource.meta
  });

export const encodeErrorObject = (error: ErrorObject): JsonObject =>
  compactObject({
    id: error.id,
    links: error.links && {
      ...compactObject({ about: encodeOptionalLink(error.links.about), type: encodeOptionalLink(error.links.type) }),
      ...error.links.extensions
    },
    status: error.status,
    code: error.code,
    title: error.title,
    detail: error.detail,
    source: error.source && compactObject({ ...error.source }),
    meta: error.meta
  });

const encodeJsonApiInfo = (info: JsonApiInfo): JsonObject =>
  compactObject({ version: info.version, ext: info.ext, profile: info.profile, meta: info.meta });

const encodeData = (data: ResourcePayload | AnyResource | AnyResource[] | null | undefined): JsonValue | undefined => {
  if (typeof data === "undefined") return undefined;
  if (data === null) return null;
  if (Array.isArray(data)) return data.map(encodeResource);
  if (isResourcePayload(data)) return payloadValue(data);
  return encodeResource(data);
};

export const encodeDocument = (document: SerializableDocument): JsonObject => ({
  ...compactObject({
    jsonapi: document.jsonApi && encodeJsonApiInfo(document.jsonApi),
    data: encodeData(document.data),
    errors: document.errors?.map(encodeErrorObject),
    links: document.links && encodeLinks(document.links),
    included: document.included?.map(encodeResource),
    meta: document.meta
  }),
  ...document.extensions
});

export const serializeDocument = (document: SerializableDocument, space?: number) =>
  JSON.stringify(encodeDocument(document), null, space);

export const serializeResource = (resource: AnyResource, space?: number) =>
  JSON.stringify(encodeResource(resource), null, space);
