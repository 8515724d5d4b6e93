export { config, loadConfig, type Config } from "./config.js";
export {
  JsonApiClient,
  readCollectionDocument,
  readJsonApiDocument,
  readSingleResourceDocument,
  type CollectedPages,
  type JsonApiClientOptions,
  type JsonApiResponse,
  type ReadDocumentOptions,
  type RequestOptions
} from "./jsonApiClient.js";
export {
  encodeDocument,
  encodeErrorObject,
  encodeRelationship,
  encodeResource,
  encodeResourceIdentifier,
  getResource,
  getResourceCollection,
  parseCollectionDocument,
  parseDocument,
  parseSingleDocument,
  projectCollection,
  projectSingle,
  serializeDocument,
  serializeResource,
  toCollectionDocument,
  toSingleResourceDocument,
  type AnyResource,
  type SerializableDocument
} from "./jsonApiDocument.js";
export {
  InvalidMediaTypeError,
  JsonApiCodecError,
  JsonApiParseError,
  JsonApiRequestError,
  JsonApiSerializationError,
  MalformedLinkError,
  normalizeJsonApiError,
  ShapeMismatchError,
  type PayloadKind
} from "./jsonApiErrors.js";
export {
  encodeLink,
  encodeLinks,
  isBareLink,
  linkSchema,
  linksObjectSchema,
  parseLink,
  serializeLink
} from "./jsonApiLink.js";
export {
  documentSchema,
  errorObjectSchema,
  jsonApiInfoSchema,
  relationshipSchema,
  relationshipsSchema,
  resourceDecoder,
  resourceIdentifierSchema,
  resourceSchema,
  toManyRelationship,
  toManyRelationshipSchema,
  toOneRelationship,
  toOneRelationshipSchema,
  type ResourceDecoder
} from "./jsonApiSchemas.js";
export type * from "./jsonApiTypes.js";
export { jsonObjectSchema, jsonValueSchema, toJsonValue, type JsonObject, type JsonValue } from "./jsonValue.js";
export { logger } from "./logger.js";
export {
  formatMediaType,
  JSON_API_MEDIA_TYPE,
  parseMediaType,
  type MediaTypeOptions,
  type MediaTypeParameters
} from "./mediaType.js";
export { dataKind, hasCollectionResource, hasErrors, hasSingleResource, toPayload } from "./resourcePayload.js";
