import { z } from "zod";
import { MalformedLinkError } from "./jsonApiErrors.js";
import type { Link, LinksObject } from "./jsonApiTypes.js";
import { defineMember, isObject, recordOf, toJsonObject, type JsonObject, type JsonValue } from "./jsonValue.js";

type Path = ReadonlyArray<string | number>;

const readString = (value: unknown, member: string, path: Path) => {
  if (value === null) return undefined;
  if (typeof value === "string") return value;
  throw new MalformedLinkError(`link member "${member}" must be a string`, [...path, member]);
};

const readMeta = (value: unknown, path: Path) => {
  if (value === null) return undefined;
  if (isObject(value)) return toJsonObject(value);
  throw new MalformedLinkError(`link member "meta" must be an object`, [...path, "meta"]);
};

/**
 * Decodes either wire form of a link. `null` means "no link" at any depth, including a nested
 * `describedby`. Unknown members of a link object are dropped.
 */
export const parseLink = (value: unknown, path: Path = []): Link | undefined => {
  if (value === null || typeof value === "undefined") return undefined;
  if (typeof value === "string") return { href: value };
  if (!isObject(value)) {
    throw new MalformedLinkError("link must be a string or object", path);
  }

  let href: string | undefined;
  let rel: string | undefined;
  let describedBy: Link | undefined;
  let title: string | undefined;
  let type: string | undefined;
  let hrefLang: string | undefined;
  let meta: JsonObject | undefined;

  for (const [member, item] of Object.entries(value)) {
    switch (member) {
      case "href":
        href = readString(item, member, path);
        break;
      case "rel":
        rel = readString(item, member, path);
        break;
      case "describedby":
        describedBy = parseLink(item, [...path, member]);
        break;
      case "title":
        title = readString(item, member, path);
        break;
      case "type":
        type = readString(item, member, path);
        break;
      case "hreflang":
        hrefLang = readString(item, member, path);
        break;
      case "meta":
        meta = readMeta(item, path);
        break;
      default:
        break;
    }
  }

  if (typeof href === "undefined") {
    throw new MalformedLinkError("href is required for link objects", path);
  }

  const link: Link = { href };
  if (typeof rel !== "undefined") link.rel = rel;
  if (describedBy) link.describedBy = describedBy;
  if (typeof title !== "undefined") link.title = title;
  if (typeof type !== "undefined") link.type = type;
  if (typeof hrefLang !== "undefined") link.hrefLang = hrefLang;
  if (meta) link.meta = meta;
  return link;
};

const present = (value: string | undefined): value is string => typeof value === "string" && value.length > 0;

/** True when the link carries nothing but its target and can be written as a bare string. */
export const isBareLink = (link: Link) =>
  present(link.href) &&
  !present(link.rel) &&
  !link.describedBy &&
  !present(link.title) &&
  !present(link.type) &&
  !present(link.hrefLang) &&
  !link.meta;

export const encodeLink = (link: Link): string | JsonObject => {
  if (isBareLink(link)) return link.href;

  const encoded: JsonObject = {};
  if (present(link.href)) encoded.href = link.href;
  if (present(link.rel)) encoded.rel = link.rel;
  if (link.describedBy) encoded.describedby = encodeLink(link.describedBy);
  if (present(link.title)) encoded.title = link.title;
  if (present(link.type)) encoded.type = link.type;
  if (present(link.hrefLang)) encoded.hreflang = link.hrefLang;
  if (link.meta) encoded.meta = link.meta;
  return encoded;
};

export const serializeLink = (link: Link) => JSON.stringify(encodeLink(link));

export const encodeLinks = (links: LinksObject): JsonObject => {
  const encoded: JsonObject = {};
  for (const [name, link] of Object.entries(links)) {
    if (typeof link === "undefined") continue;
    defineMember(encoded, name, link === null ? null : encodeLink(link));
  }
  return encoded;
};

export const encodeOptionalLink = (link: Link | null | undefined): JsonValue | undefined =>
  link === null ? null : link ? encodeLink(link) : undefined;

export const linkSchema = z.unknown().transform((value, ctx) => parseLink(value, ctx.path));

export const linksObjectSchema = recordOf(
  z.unknown().transform((value, ctx): Link | null => parseLink(value, ctx.path) ?? null)
);
