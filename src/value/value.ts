import type { MediaType } from "../typeir/types";

export type MediaContent =
  | { readonly kind: "url"; readonly url: string }
  | { readonly kind: "base64"; readonly base64: string; readonly mimeType?: string }
  | { readonly kind: "file"; readonly path: string };

export interface BamlMedia {
  readonly mediaType: MediaType;
  readonly content: MediaContent;
}

export interface VString {
  readonly tag: "String";
  readonly value: string;
}

export interface VInt {
  readonly tag: "Int";
  readonly value: bigint;
}

export interface VFloat {
  readonly tag: "Float";
  readonly value: number;
}

export interface VBool {
  readonly tag: "Bool";
  readonly value: boolean;
}

export interface VNull {
  readonly tag: "Null";
}

export interface VList {
  readonly tag: "List";
  readonly items: readonly BamlValue[];
}

/** Insertion order is kept for rendering; equality ignores it. */
export interface VMap {
  readonly tag: "Map";
  readonly entries: ReadonlyMap<string, BamlValue>;
}

export interface VClass {
  readonly tag: "Class";
  readonly name: string;
  readonly fields: ReadonlyMap<string, BamlValue>;
}

export interface VEnum {
  readonly tag: "Enum";
  readonly name: string;
  readonly variant: string;
}

export interface VMedia {
  readonly tag: "Media";
  readonly media: BamlMedia;
}

export type BamlValue = VString | VInt | VFloat | VBool | VNull | VList | VMap | VClass | VEnum | VMedia;

export type BamlValueTag = BamlValue["tag"];

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

// =========================================================================
// Constructors
// =========================================================================

export const NULL: VNull = { tag: "Null" };

export function vString(value: string): VString {
  return { tag: "String", value };
}

/** Throws `RangeError` outside i64. */
export function vInt(value: bigint | number): VInt {
  const n = typeof value === "bigint" ? value : BigInt(value);
  if (n < I64_MIN || n > I64_MAX) throw new RangeError(`${n} is outside the i64 range`);
  return { tag: "Int", value: n };
}

export function vFloat(value: number): VFloat {
  return { tag: "Float", value };
}

export function vBool(value: boolean): VBool {
  return { tag: "Bool", value };
}

export function vNull(): VNull {
  return NULL;
}

export function vList(items: readonly BamlValue[]): VList {
  return { tag: "List", items };
}

type Entries = Iterable<readonly [string, BamlValue]> | Readonly<Record<string, BamlValue>>;

function isEntryIterable(entries: Entries): entries is Iterable<readonly [string, BamlValue]> {
  return Symbol.iterator in entries;
}

function toEntryMap(entries: Entries): Map<string, BamlValue> {
  if (isEntryIterable(entries)) {
    return new Map(Array.from(entries, ([k, v]): [string, BamlValue] => [k, v]));
  }
  return new Map(Object.entries(entries));
}

export function vMap(entries: Entries): VMap {
  return { tag: "Map", entries: toEntryMap(entries) };
}

export function vClass(name: string, fields: Entries): VClass {
  return { tag: "Class", name, fields: toEntryMap(fields) };
}

export function vEnum(name: string, variant: string): VEnum {
  return { tag: "Enum", name, variant };
}

export function vMedia(media: BamlMedia): VMedia {
  return { tag: "Media", media };
}

// =========================================================================
// Queries
// =========================================================================

/** Field map of a class or map value. */
export function entriesOf(v: BamlValue): ReadonlyMap<string, BamlValue> | undefined {
  if (v.tag === "Class") return v.fields;
  if (v.tag === "Map") return v.entries;
  return undefined;
}

export function valueEquals(a: BamlValue, b: BamlValue): boolean {
  switch (a.tag) {
    case "String":
      return b.tag === "String" && b.value === a.value;
    case "Int":
      return b.tag === "Int" && b.value === a.value;
    case "Float":
      return b.tag === "Float" && b.value === a.value;
    case "Bool":
      return b.tag === "Bool" && b.value === a.value;
    case "Null":
      return b.tag === "Null";
    case "List":
      return b.tag === "List" && b.items.length === a.items.length && a.items.every((x, i) => {
        const y = b.items[i];
        return y !== undefined && valueEquals(x, y);
      });
    case "Map":
      return b.tag === "Map" && entriesEqual(a.entries, b.entries);
    case "Class":
      return b.tag === "Class" && b.name === a.name && entriesEqual(a.fields, b.fields);
    case "Enum":
      return b.tag === "Enum" && b.name === a.name && b.variant === a.variant;
    case "Media":
      return b.tag === "Media" && JSON.stringify(a.media) === JSON.stringify(b.media);
  }
}

function entriesEqual(a: ReadonlyMap<string, BamlValue>, b: ReadonlyMap<string, BamlValue>): boolean {
  if (a.size !== b.size) return false;
  for (const [k, v] of a) {
    const other = b.get(k);
    if (other === undefined || !valueEquals(v, other)) return false;
  }
  return true;
}

/** Short description of a value for "got ..." messages. */
export function describeValue(v: BamlValue): string {
  switch (v.tag) {
    case "String":
      return `string ${JSON.stringify(v.value)}`;
    case "Int":
      return v.value.toString();
    case "Float":
      return String(v.value);
    case "Bool":
      return String(v.value);
    case "Null":
      return "null";
    case "List":
      return "list";
    case "Map":
      return "map";
    case "Class":
      return `class ${v.name}`;
    case "Enum":
      return `enum ${v.name}.${v.variant}`;
    case "Media":
      return `media ${v.media.mediaType}`;
  }
}
