export type PathSegment =
  | { readonly kind: "field"; readonly name: string }
  | { readonly kind: "index"; readonly index: number }
  | { readonly kind: "key"; readonly key: string };

/** Immutable path from the root value to the value being converted. */
export class ValuePath {
  static readonly ROOT = new ValuePath([]);

  private constructor(readonly segments: readonly PathSegment[]) {}

  static of(...segments: PathSegment[]): ValuePath {
    return new ValuePath(segments);
  }

  field(name: string): ValuePath {
    return new ValuePath([...this.segments, { kind: "field", name }]);
  }

  index(index: number): ValuePath {
    return new ValuePath([...this.segments, { kind: "index", index }]);
  }

  key(key: string): ValuePath {
    return new ValuePath([...this.segments, { kind: "key", key }]);
  }

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  /** Renders as `a.b[3]["k"]`; the empty path renders as `<root>`. */
  toString(): string {
    if (this.segments.length === 0) return "<root>";
    let out = "";
    for (const seg of this.segments) {
      switch (seg.kind) {
        case "field":
          out += out === "" ? seg.name : `.${seg.name}`;
          break;
        case "index":
          out += `[${seg.index}]`;
          break;
        case "key":
          out += `["${seg.key.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"]`;
          break;
      }
    }
    return out;
  }
}
