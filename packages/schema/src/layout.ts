import { LoweringError } from "./errors";
import { formatTypeKind } from "./typeExpression";
import type { TypeRegistry } from "./typeRegistry";
import type { StructType, TypeKind } from "./types";

/**
 * Width in bits of a type that may appear inside a packed struct. Packed structs cross the
 * FFI boundary as a single unsigned integer of their total width.
 */
export function packedBitSize(kind: TypeKind, registry: TypeRegistry, context: string): number {
  switch (kind.kind) {
    case "bool":
      return 1;
    case "int":
      if (kind.signed) {
        throw new LoweringError(`Packed field ${context} must be unsigned, got ${formatTypeKind(kind)}`, { context });
      }
      return kind.bits;
    case "enum":
      return kind.tagBits;
    case "struct":
      if (kind.layout !== "packed") {
        throw new LoweringError(`Packed field ${context} cannot hold a ${kind.layout} struct`, { context });
      }
      return packedStructBitSize(kind, registry, context);
    case "type-ref":
      return packedBitSize(registry.get(kind.name).kind, registry, context);
    case "array":
    case "pointer":
    case "float":
    case "void":
    case "opaque":
      throw new LoweringError(`Packed field ${context} has unsupported type ${formatTypeKind(kind)}`, { context });
    default:
      kind satisfies never;
      throw new LoweringError(`Packed field ${context} has an unknown type kind`, { context });
  }
}

export function packedStructBitSize(struct: StructType, registry: TypeRegistry, context: string): number {
  return struct.fields.reduce(
    (total, field) => total + packedBitSize(field.type, registry, `${context}.${field.name}`),
    0
  );
}
