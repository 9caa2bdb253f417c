import {
  box,
  enumeration,
  field,
  list,
  map,
  option,
  record,
  scalars,
  set,
  struct,
  variant,
} from "../../src/schema/shapes";
import type { EnumShape, StructShape } from "../../src/schema/shape";

export interface Address {
  street: string;
  zip: string;
}

export const AddressShape = struct<Address>("Address", {
  module: "app::models",
  fields: [field("street", scalars.string), field("zip", scalars.string)],
});

export type Color = "Red" | "Green" | "Blue";

export const ColorShape = enumeration<Color>("Color", {
  doc: "Paint colors.",
  variants: [
    variant("Red"),
    variant("Green", { attrs: { rename: "GREEN", alias: "verde" } }),
    variant("Blue", { doc: "  The sky.  " }),
  ],
});

export type Figure = { kind: "Circle"; radius: number } | { kind: "Square"; side: number } | { kind: "Empty" };

export const FigureShape = enumeration<Figure>("Figure", {
  attrs: { tag: "kind" },
  variants: [
    variant("Circle", { fields: [field("radius", scalars.f64)] }),
    variant("Square", { attrs: { rename: "square" }, fields: [field("side", scalars.f64)] }),
    variant("Empty"),
  ],
});

export interface User {
  name: string;
  age: number;
  email: string | null;
  address: Address;
  tags: string[];
  favorite: Color;
}

export const UserShape = struct<User>("User", {
  module: "app::models",
  doc: ["A registered user.", "  Second line.  "],
  fields: [
    field("name", scalars.string, { doc: "Full name" }),
    field("age", scalars.u32),
    field("email", option(scalars.string), { rename: "email_address" }),
    field("address", box(AddressShape)),
    field("tags", list(scalars.string)),
    field("favorite", ColorShape),
  ],
});

export interface Node {
  value: number;
  next: Node | null;
}

export const NodeShape: StructShape<Node> = struct<Node>("Node", {
  fields: [field("value", scalars.i32), field("next", option(() => NodeShape))],
});

export interface Everything {
  flag: boolean;
  letter: string;
  ratio: number;
  big: bigint;
  small: number;
  maybe: number | null;
  labels: Set<string>;
  scores: Map<string, number>;
  counts: Record<string, number>;
  figure: Figure;
  figures: Figure[];
  color: Color;
  home: Address;
}

export const EverythingShape = struct<Everything>("Everything", {
  fields: [
    field("flag", scalars.bool),
    field("letter", scalars.char),
    field("ratio", scalars.f64),
    field("big", scalars.i64),
    field("small", scalars.i8),
    field("maybe", option(scalars.u16)),
    field("labels", set(scalars.string)),
    field("scores", map(scalars.string, scalars.f32)),
    field("counts", record(scalars.i32)),
    field("figure", FigureShape),
    field("figures", list(FigureShape)),
    field("color", ColorShape),
    field("home", AddressShape),
  ],
});

export const sampleUser: User = {
  name: "Ada",
  age: 36,
  email: null,
  address: { street: "1 Main St", zip: "12345" },
  tags: ["admin", "ops"],
  favorite: "Green",
};

export function colorUnionShape(): EnumShape<Color> {
  return enumeration<Color>("ColorChoice", {
    attrs: { asUnion: true },
    variants: [variant("Red"), variant("Green", { attrs: { rename: "GREEN" } }), variant("Blue")],
  });
}
