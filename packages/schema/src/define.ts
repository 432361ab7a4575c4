/**
 * Builder API for describing native types in TypeScript instead of a YAML document.
 *
 * @example
 * ```ts
 * import { n, defineEnum, defineExtern, field, reserved } from "@wirebind/schema";
 *
 * const Status = defineEnum("status_t", { ok: 0, failure: 1 }, { tagBits: 32 });
 * const Account = defineExtern("account_t", [
 *   field("id", n.u128()),
 *   field("status", Status),
 *   reserved(n.array(n.u8(), 4)),
 * ]);
 * ```
 */

import type {
  OperationArity,
  OperationDefinition,
  StructField,
  StructLayout,
  TypeDefinition,
  TypeKind,
} from "./types";

/** A structural type, or a declaration that is referenced by name. */
export type TypeInput = TypeKind | TypeDefinition;

function isTypeDefinition(input: TypeInput): input is TypeDefinition {
  return typeof input.kind === "object";
}

export function toTypeKind(input: TypeInput): TypeKind {
  if (isTypeDefinition(input)) {
    return { kind: "type-ref", name: input.name };
  }
  return input;
}

export interface NativeTypeBuilder {
  bool(): TypeKind;
  u8(): TypeKind;
  u16(): TypeKind;
  u32(): TypeKind;
  u64(): TypeKind;
  u128(): TypeKind;
  /** Unsigned integer of arbitrary width, e.g. packed-struct padding. */
  uint(bits: number): TypeKind;
  /** Signed integer. Accepted by the model, rejected by every lowering. */
  int(bits: number): TypeKind;
  float(bits: number): TypeKind;
  void(): TypeKind;
  opaque(): TypeKind;
  array(element: TypeInput, length: number): TypeKind;
  pointer(pointee: TypeInput, options?: { nullable?: boolean }): TypeKind;
  ref(name: string): TypeKind;
}

export const n: NativeTypeBuilder = {
  bool: () => ({ kind: "bool" }),
  u8: () => ({ kind: "int", bits: 8, signed: false }),
  u16: () => ({ kind: "int", bits: 16, signed: false }),
  u32: () => ({ kind: "int", bits: 32, signed: false }),
  u64: () => ({ kind: "int", bits: 64, signed: false }),
  u128: () => ({ kind: "int", bits: 128, signed: false }),
  uint: (bits) => ({ kind: "int", bits, signed: false }),
  int: (bits) => ({ kind: "int", bits, signed: true }),
  float: (bits) => ({ kind: "float", bits }),
  void: () => ({ kind: "void" }),
  opaque: () => ({ kind: "opaque" }),
  array: (element, length) => ({ kind: "array", element: toTypeKind(element), length }),
  pointer: (pointee, options) => ({
    kind: "pointer",
    pointee: toTypeKind(pointee),
    nullable: options?.nullable ?? false,
  }),
  ref: (name) => ({ kind: "type-ref", name }),
};

export function field(name: string, type: TypeInput, options?: { reserved?: boolean }): StructField {
  return { name, type: toTypeKind(type), reserved: options?.reserved ?? false };
}

export function reserved(type: TypeInput, name = "reserved"): StructField {
  return field(name, type, { reserved: true });
}

export function defineStruct(name: string, layout: StructLayout, fields: StructField[]): TypeDefinition {
  return { name, kind: { kind: "struct", layout, fields } };
}

export function defineExtern(name: string, fields: StructField[]): TypeDefinition {
  return defineStruct(name, "extern", fields);
}

export function definePacked(name: string, fields: StructField[]): TypeDefinition {
  return defineStruct(name, "packed", fields);
}

export function defineEnum(
  name: string,
  variants: Record<string, number | bigint>,
  options?: { tagBits?: number }
): TypeDefinition {
  return {
    name,
    kind: {
      kind: "enum",
      tagBits: options?.tagBits ?? 8,
      variants: Object.entries(variants).map(([variantName, value]) => ({
        name: variantName,
        value: BigInt(value),
      })),
    },
  };
}

/** Declares a named alias for a structural type, e.g. an opaque client handle. */
export function defineAlias(name: string, type: TypeInput): TypeDefinition {
  return { name, kind: toTypeKind(type) };
}

export interface OperationInput {
  name: string;
  arity: OperationArity;
  event: TypeInput;
  result: TypeInput;
  eventName: string;
}

export function defineOperation(input: OperationInput): OperationDefinition {
  return {
    name: input.name,
    arity: input.arity,
    event: toTypeKind(input.event),
    result: toTypeKind(input.result),
    eventName: input.eventName,
  };
}
