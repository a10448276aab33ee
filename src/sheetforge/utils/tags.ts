// utils/tags.ts

import type { Tag, TagValue } from "../model-types.js";

interface TagInfo {
  tag: Tag;
  hasValue: boolean;
}

/** Normalized token -> tag. Tokens are compared lower-cased without - and _ */
const TAG_NAMES: Record<string, TagInfo> = {
  unique: { tag: "unique", hasValue: false },
  index: { tag: "index", hasValue: false },
  notnull: { tag: "notNull", hasValue: false },
  autoincrement: { tag: "autoIncrement", hasValue: false },
  autoinc: { tag: "autoIncrement", hasValue: false },
  primarykey: { tag: "primaryKey", hasValue: false },
  pk: { tag: "primaryKey", hasValue: false },
  default: { tag: "default", hasValue: true },
  foreignkey: { tag: "foreignKey", hasValue: true },
  fk: { tag: "foreignKey", hasValue: true },
  size: { tag: "size", hasValue: true },
  design: { tag: "design", hasValue: false },
  designonly: { tag: "design", hasValue: false },
  ignore: { tag: "ignore", hasValue: false },
  readonly: { tag: "readOnly", hasValue: false },
  writeonly: { tag: "writeOnly", hasValue: false },
  validate: { tag: "validate", hasValue: true },
};

export function normalizeTagString(s: string): string {
  return s.trim().toLowerCase().replace(/[-_]/g, "");
}

export function parseTag(token: string): Tag | null {
  return TAG_NAMES[normalizeTagString(token)]?.tag ?? null;
}

/**
 * `default:0` -> { tag: "default", value: "0" }.
 * A value given to a tag that takes none is discarded.
 */
export function parseTagWithValue(token: string): TagValue | null {
  const sep = token.indexOf(":");
  const name = sep === -1 ? token : token.slice(0, sep);

  const info = TAG_NAMES[normalizeTagString(name)];
  if (!info) return null;

  if (info.hasValue && sep !== -1) {
    return { tag: info.tag, value: token.slice(sep + 1).trim() };
  }
  return { tag: info.tag };
}

/** Unknown tokens are dropped, not reported */
export function parseColumnTags(tagStr: string | undefined): TagValue[] {
  const out: TagValue[] = [];
  for (const raw of String(tagStr ?? "").split(",")) {
    const token = raw.trim();
    if (!token) continue;

    const tv = parseTagWithValue(token);
    if (tv) out.push(tv);
  }
  return out;
}

export function hasTag(tags: readonly TagValue[], tag: Tag): boolean {
  return tags.some((t) => t.tag === tag);
}

/** First occurrence wins */
export function getTagValue(
  tags: readonly TagValue[],
  tag: Tag
): string | undefined {
  return tags.find((t) => t.tag === tag)?.value;
}

/** Canonical tag string for generated code: `unique,default:0` */
export function formatTags(tags: readonly TagValue[]): string {
  return tags
    .map((t) => (t.value !== undefined ? `${t.tag}:${t.value}` : t.tag))
    .join(",");
}
