import type { JsonObject, JsonValue } from "./jsonValue.js";

/** A hypermedia link, either parsed from a bare URI string or from a link object. */
export type Link = {
  href: string;
  rel?: string;
  describedBy?: Link;
  title?: string;
  type?: string;
  hrefLang?: string;
  meta?: JsonObject;
};

/** `null` marks a link the server declares unavailable, such as `prev` on the first page. */
export type LinksObject = {
  self?: Link | null;
  related?: Link | null;
  describedby?: Link | null;
  first?: Link | null;
  last?: Link | null;
  prev?: Link | null;
  next?: Link | null;
  [name: string]: Link | null | undefined;
};

/**
 * The `data` member of a document or relationship, kept as a parsed JSON tree until a caller
 * projects it. `raw` on the absent variant is `null` when the member was an explicit null.
 */
export type ResourcePayload =
  | { readonly kind: "absent"; readonly raw?: null }
  | { readonly kind: "single"; readonly raw: JsonObject }
  | { readonly kind: "collection"; readonly raw: JsonValue[] }
  | { readonly kind: "scalar"; readonly raw: string | number | boolean };

export type ResourceIdentifier = {
  type: string;
  id?: string;
  localId?: string;
  meta?: JsonObject;
};

export type RelationshipData = ResourcePayload | ResourceIdentifier | ResourceIdentifier[] | null;

export type Relationship<TData extends RelationshipData = ResourcePayload> = {
  links?: LinksObject;
  data?: TData;
  meta?: JsonObject;
  extensions?: JsonObject;
};

export type ToOneRelationship<TIdentifier extends ResourceIdentifier = ResourceIdentifier> = Relationship<TIdentifier | null>;

export type ToManyRelationship<TIdentifier extends ResourceIdentifier = ResourceIdentifier> = Relationship<TIdentifier[]>;

export type Relationships = Record<string, Relationship>;

/**
 * Anything a typed `relationships` member may decode into. Declare typed relationships with a
 * type alias (or infer them from a schema): interfaces carry no index signature.
 */
export type RelationshipsShape = { [name: string]: Relationship<RelationshipData> | undefined };

export type Resource<TAttributes = JsonObject, TRelationships extends RelationshipsShape = Relationships> =
  ResourceIdentifier & {
    attributes?: TAttributes;
    relationships?: TRelationships;
    links?: LinksObject;
  };

export type ErrorLinks = {
  about?: Link;
  type?: Link;
  extensions?: JsonObject;
};

export type ErrorSource = {
  pointer?: string;
  parameter?: string;
  header?: string;
};

export type ErrorObject = {
  id?: string;
  links?: ErrorLinks;
  status?: string;
  code?: string;
  title?: string;
  detail?: string;
  source?: ErrorSource;
  meta?: JsonObject;
};

export type JsonApiInfo = {
  version?: string;
  ext?: string[];
  profile?: string[];
  meta?: JsonObject;
};

type DocumentMembers = {
  jsonApi?: JsonApiInfo;
  errors?: ErrorObject[];
  links?: LinksObject;
  included?: Resource[];
  meta?: JsonObject;
  /** Top-level members no JSON:API rule names, such as those an applied extension defines. */
  extensions?: JsonObject;
};

export type JsonApiDocument = DocumentMembers & {
  data: ResourcePayload;
};

/** `data: null` is an empty to-one primary data, kept apart from a missing `data`. */
export type SingleResourceDocument<TResource> = DocumentMembers & {
  data?: TResource | null;
};

export type CollectionResourceDocument<TResource> = DocumentMembers & {
  data?: TResource[];
};
