import { SchemaValidationError } from "./errors";
import type { TypeKind } from "./types";

const INT_PATTERN = /^([ui])(\d+)$/;
const FLOAT_PATTERN = /^f(16|32|64|128)$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ARRAY_PATTERN = /^\[(\d+)\](.+)$/;

export const MAX_INT_BITS = 128;

/**
 * Parses a type expression as written in schema documents.
 *
 * Grammar: `u<N>` / `i<N>` integers, `f16`..`f128`, `bool`, `void`, `anyopaque`,
 * `[N]T` fixed arrays, `*T` pointers, `?*T` nullable pointers, and declaration names.
 */
export function parseTypeExpression(source: string, context: string): TypeKind {
  const text = source.trim();
  if (text.length === 0) {
    throw new SchemaValidationError(`Type expression for ${context} must not be empty`, { context });
  }

  if (text.startsWith("?")) {
    const inner = text.slice(1);
    if (!inner.startsWith("*")) {
      throw new SchemaValidationError(`Optional type '${text}' in ${context} must wrap a pointer`, { context, expression: text });
    }
    return { kind: "pointer", pointee: parseTypeExpression(inner.slice(1), context), nullable: true };
  }

  if (text.startsWith("*")) {
    return { kind: "pointer", pointee: parseTypeExpression(text.slice(1), context), nullable: false };
  }

  const arrayMatch = ARRAY_PATTERN.exec(text);
  if (arrayMatch) {
    const length = Number(arrayMatch[1]);
    if (!Number.isSafeInteger(length) || length <= 0) {
      throw new SchemaValidationError(`Array length in '${text}' (${context}) must be a positive integer`, {
        context,
        expression: text,
      });
    }
    return { kind: "array", element: parseTypeExpression(arrayMatch[2], context), length };
  }

  switch (text) {
    case "bool":
      return { kind: "bool" };
    case "void":
      return { kind: "void" };
    case "anyopaque":
      return { kind: "opaque" };
  }

  const intMatch = INT_PATTERN.exec(text);
  if (intMatch) {
    const bits = Number(intMatch[2]);
    if (bits <= 0 || bits > MAX_INT_BITS) {
      throw new SchemaValidationError(`Integer width in '${text}' (${context}) must be between 1 and ${MAX_INT_BITS}`, {
        context,
        expression: text,
      });
    }
    return { kind: "int", bits, signed: intMatch[1] === "i" };
  }

  const floatMatch = FLOAT_PATTERN.exec(text);
  if (floatMatch) {
    return { kind: "float", bits: Number(floatMatch[1]) };
  }

  if (IDENTIFIER_PATTERN.test(text)) {
    return { kind: "type-ref", name: text };
  }

  throw new SchemaValidationError(`Cannot parse type expression '${text}' in ${context}`, { context, expression: text });
}

/** Renders a type back into expression syntax, for diagnostics. */
export function formatTypeKind(kind: TypeKind): string {
  switch (kind.kind) {
    case "bool":
      return "bool";
    case "void":
      return "void";
    case "opaque":
      return "anyopaque";
    case "int":
      return `${kind.signed ? "i" : "u"}${kind.bits}`;
    case "float":
      return `f${kind.bits}`;
    case "array":
      return `[${kind.length}]${formatTypeKind(kind.element)}`;
    case "pointer":
      return `${kind.nullable ? "?" : ""}*${formatTypeKind(kind.pointee)}`;
    case "type-ref":
      return kind.name;
    case "enum":
      return `enum(u${kind.tagBits})`;
    case "struct":
      return `${kind.layout} struct`;
    default:
      kind satisfies never;
      return "unknown";
  }
}
