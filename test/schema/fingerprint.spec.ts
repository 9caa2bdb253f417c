import { describe, it, expect } from "vitest";
import { buildSchema } from "../../src/schema/builder";
import { schemaFingerprint } from "../../src/schema/fingerprint";
import { field, scalars, struct } from "../../src/schema/shapes";
import { DEFAULT_RENDER_OPTIONS } from "../../src/config/config";
import { UserShape } from "../helpers/fixtures";

function holder(itemInternalName?: string) {
  const first = struct("Item", { fields: [field("a", scalars.string)] });
  const second = struct("Item", {
    attrs: itemInternalName === undefined ? {} : { internalName: itemInternalName },
    fields: [field("b", scalars.i32)],
  });
  return struct("Holder", { fields: [field("first", first), field("second", second)] });
}

describe("schemaFingerprint", () => {

  it("has a fixed prefix and 32 hex digits", () => {
    expect(schemaFingerprint(buildSchema(UserShape).outputFormat)).toMatch(/^schema:sha256:[0-9a-f]{32}$/);
  });

  it("is stable across builds", () => {
    const a = schemaFingerprint(buildSchema(UserShape).outputFormat);
    const b = schemaFingerprint(buildSchema(UserShape).outputFormat);
    expect(a).toBe(b);
  });

  it("ignores internal collision names", () => {
    const suffixed = buildSchema(holder());
    const pinned = buildSchema(holder("custom_item"));
    expect(suffixed.outputFormat.classes().map(c => c.name.name)).toEqual(["Holder", "Item", "Item__1"]);
    expect(pinned.outputFormat.classes().map(c => c.name.name)).toEqual(["Holder", "Item", "custom_item"]);
    expect(schemaFingerprint(suffixed.outputFormat)).toBe(schemaFingerprint(pinned.outputFormat));
  });

  it("changes when a rendered name changes", () => {
    const plain = struct("Point", { fields: [field("x", scalars.f64)] });
    const renamed = struct("Point", { fields: [field("x", scalars.f64, { rename: "X" })] });
    expect(schemaFingerprint(buildSchema(plain).outputFormat)).not.toBe(
      schemaFingerprint(buildSchema(renamed).outputFormat)
    );
  });

  it("changes with field order", () => {
    const xy = struct("Point", { fields: [field("x", scalars.f64), field("y", scalars.f64)] });
    const yx = struct("Point", { fields: [field("y", scalars.f64), field("x", scalars.f64)] });
    expect(schemaFingerprint(buildSchema(xy).outputFormat)).not.toBe(schemaFingerprint(buildSchema(yx).outputFormat));
  });

  it("changes with render options", () => {
    const format = buildSchema(UserShape).outputFormat;
    expect(schemaFingerprint(format)).not.toBe(
      schemaFingerprint(format, { ...DEFAULT_RENDER_OPTIONS, quoteClassFields: true })
    );
  });
});
