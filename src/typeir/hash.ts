import { createHash } from "crypto";
import type { MetaBase } from "./meta";
import type { TypeGeneric } from "./types";
import { encodeCanonical } from "./codec";

export type TypeHash = `type:sha256:${string}`;

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Semantic hash of a type tree. Metadata is included unless disabled.
 */
export function hashType<M extends MetaBase>(t: TypeGeneric<M>, options?: { includeMeta?: boolean }): TypeHash {
  const canonical = encodeCanonical(t, { includeMeta: options?.includeMeta ?? true });
  return `type:sha256:${sha256Hex(canonical).slice(0, 32)}`;
}
