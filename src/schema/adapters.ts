import type { TypeIR } from "../typeir/types";
import type { BamlValue } from "../value/value";
import type { ValuePath } from "../value/path";
import type { SchemaRegistry } from "./registry";

/** Naming context handed to a field codec when it registers schema entries. */
export interface FieldCodecRegisterContext {
  readonly registry: SchemaRegistry;
  readonly ownerInternalName?: string;
  readonly fieldName?: string;
  readonly renderedFieldName?: string;
  readonly variantName?: string;
  readonly renderedVariantName?: string;
}

/**
 * Field-level override of schema derivation and value conversion.
 * `fromBaml` reports failures by throwing `BamlConvertError` at `path`.
 */
export interface FieldCodec<T> {
  typeIR(): TypeIR;
  register?(ctx: FieldCodecRegisterContext): void;
  toBaml(value: T): BamlValue;
  fromBaml(value: BamlValue, path: ValuePath): T;
}
