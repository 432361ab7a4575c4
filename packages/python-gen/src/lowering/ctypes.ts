import {
  formatTypeKind,
  isUnsignedInt,
  LoweringError,
  packedStructBitSize,
  type PointerType,
  type TypeKind,
} from "@wirebind/schema";
import { ctypeStructName, WIDE_INT_CTYPE } from "../naming";
import { resolveType, underlyingKind, type LoweringContext } from "./context";

const FIXED_WIDTH_CTYPES: Record<number, string> = {
  8: "ctypes.c_uint8",
  16: "ctypes.c_uint16",
  32: "ctypes.c_uint32",
  64: "ctypes.c_uint64",
  128: WIDE_INT_CTYPE,
};

/**
 * Lowers a native type to the ctypes expression used in `_fields_`, argtypes and aliases.
 * Every kind is handled explicitly; anything without an FFI representation throws.
 */
export function lowerToCtype(kind: TypeKind, ctx: LoweringContext, context: string): string {
  switch (kind.kind) {
    case "array":
      return `${lowerToCtype(kind.element, ctx, `${context}[]`)} * ${kind.length}`;
    case "enum":
      return lowerUnsigned(kind.tagBits, context);
    case "struct":
      if (kind.layout === "packed") {
        return lowerUnsigned(packedStructBitSize(kind, ctx.types, context), context);
      }
      throw new LoweringError(`${context} holds an ${kind.layout} struct by value, which has no ctypes primitive`, {
        context,
      });
    case "bool":
      return "ctypes.c_bool";
    case "int":
      if (kind.signed) {
        throw new LoweringError(`${context} is a signed integer (${formatTypeKind(kind)}); only unsigned integers are supported`, {
          context,
        });
      }
      return lowerUnsigned(kind.bits, context);
    case "pointer":
      return lowerPointer(kind, ctx, context);
    case "void":
      return "None";
    case "type-ref":
      return lowerToCtype(ctx.types.get(kind.name).kind, ctx, `${context} (${kind.name})`);
    case "float":
    case "opaque":
      throw new LoweringError(`${context} has type ${formatTypeKind(kind)}, which has no ctypes mapping`, { context });
    default:
      kind satisfies never;
      throw new LoweringError(`${context} has an unknown type kind`, { context });
  }
}

/** Unsigned integer of the given width; only the standard widths and 128 exist at the FFI layer. */
export function lowerUnsigned(bits: number, context: string): string {
  const ctype = FIXED_WIDTH_CTYPES[bits];
  if (ctype === undefined) {
    throw new LoweringError(`${context} needs a u${bits}, which has no ctypes mapping`, { context, bits });
  }
  return ctype;
}

function lowerPointer(pointer: PointerType, ctx: LoweringContext, context: string): string {
  // Nullability only matters to callers; both forms share one FFI representation.
  const pointee = pointer.pointee;
  if (pointee.kind === "opaque") {
    return "ctypes.c_void_p";
  }
  if (pointee.kind === "type-ref") {
    return `ctypes.POINTER(${ctypeStructName(ctx.mappings.requireAll(pointee.name, context))})`;
  }
  throw new LoweringError(`${context} points to ${formatTypeKind(pointee)}; pointers must target anyopaque or a declared type`, {
    context,
  });
}

/**
 * Name of the ctypes class used to marshal operation events and results: the wide-integer
 * wrapper for a u128, the structure binding for an extern struct. Aliases are followed first.
 */
export function ctypeWrapperName(kind: TypeKind, ctx: LoweringContext, context: string): string {
  const resolved = resolveType(kind, ctx);
  if (isUnsignedInt(resolved.kind) && resolved.kind.bits === 128) {
    return WIDE_INT_CTYPE;
  }
  if (resolved.declaration !== undefined && resolved.kind.kind === "struct" && resolved.kind.layout === "extern") {
    return ctypeStructName(ctx.mappings.requireAll(resolved.declaration, context));
  }
  throw new LoweringError(
    `${context} has type ${formatTypeKind(kind)}, which cannot be marshalled as a batch element`,
    { context }
  );
}

/** True for fields that go through the runtime's wide-integer wrapper. */
export function isWideInt(kind: TypeKind, ctx: LoweringContext): boolean {
  const resolved = underlyingKind(kind, ctx);
  return isUnsignedInt(resolved) && resolved.bits === 128;
}
