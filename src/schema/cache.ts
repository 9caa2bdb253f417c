import { buildSchema, type SchemaBuildOptions, type SchemaBundle } from "./builder";
import type { Shape } from "./shape";

/**
 * Builds each shape's schema once and hands back the same bundle afterwards.
 * Build failures are not cached; the next call rebuilds and throws again.
 */
export class SchemaCache {
  private bundles: Map<Shape, SchemaBundle> = new Map();

  constructor(private readonly options: SchemaBuildOptions = {}) {}

  get(shape: Shape): SchemaBundle {
    let bundle = this.bundles.get(shape);
    if (!bundle) {
      bundle = buildSchema(shape, this.options);
      this.bundles.set(shape, bundle);
    }
    return bundle;
  }

  has(shape: Shape): boolean {
    return this.bundles.has(shape);
  }

  get size(): number {
    return this.bundles.size;
  }

  clear(): void {
    this.bundles.clear();
  }
}

/** Process-wide cache used when a caller passes no bundle. */
export const defaultSchemaCache = new SchemaCache();
