import type { BamlValue } from "./value";

export type PlainValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Project a value onto plain JS data for expression evaluation. Integers
 * inside the safe range become numbers so comparisons like `this > 0` work.
 * Enums become their variant name and media their descriptor.
 */
export function toPlain(v: BamlValue): PlainValue {
  switch (v.tag) {
    case "String":
    case "Float":
    case "Bool":
      return v.value;
    case "Int":
      return v.value >= BigInt(Number.MIN_SAFE_INTEGER) && v.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(v.value)
        : v.value;
    case "Null":
      return null;
    case "List":
      return v.items.map(toPlain);
    case "Map":
      return entriesToPlain(v.entries);
    case "Class":
      return entriesToPlain(v.fields);
    case "Enum":
      return v.variant;
    case "Media": {
      const content: { [key: string]: PlainValue } = {};
      for (const [k, val] of Object.entries(v.media.content)) {
        if (typeof val === "string") content[k] = val;
      }
      return { media_type: v.media.mediaType, ...content };
    }
  }
}

function entriesToPlain(entries: ReadonlyMap<string, BamlValue>): { [key: string]: PlainValue } {
  const out: { [key: string]: PlainValue } = {};
  for (const [k, val] of entries) {
    out[k] = toPlain(val);
  }
  return out;
}
