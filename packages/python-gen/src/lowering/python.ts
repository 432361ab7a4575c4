import { formatTypeKind, InternalError, LoweringError, type TypeKind } from "@wirebind/schema";
import type { LoweringContext } from "./context";

/**
 * Lowers a native type to the Python annotation used in dataclasses and method
 * signatures. Only domain mappings are consulted: protocol types never surface as values.
 */
export function lowerToPython(kind: TypeKind, ctx: LoweringContext, context: string): string {
  switch (kind.kind) {
    case "type-ref": {
      const definition = ctx.types.get(kind.name);
      if (definition.kind.kind === "enum" || definition.kind.kind === "struct") {
        return ctx.mappings.requireDomain(definition.name, context);
      }
      return lowerToPython(definition.kind, ctx, `${context} (${kind.name})`);
    }
    case "array":
      return `${lowerToPython(kind.element, ctx, `${context}[]`)}[${kind.length}]`;
    case "bool":
      return "bool";
    case "int":
      if (kind.signed) {
        throw new LoweringError(`${context} is a signed integer (${formatTypeKind(kind)}); only unsigned integers are supported`, {
          context,
        });
      }
      return "int";
    case "void":
      return "None";
    case "enum":
    case "struct":
      throw new InternalError(`Anonymous ${kind.kind} reached domain lowering at ${context}`, { context });
    case "pointer":
    case "float":
    case "opaque":
      throw new LoweringError(`${context} has type ${formatTypeKind(kind)}, which has no Python value type`, { context });
    default:
      kind satisfies never;
      throw new LoweringError(`${context} has an unknown type kind`, { context });
  }
}

/** Default value expression for a dataclass field of the given type. */
export function pythonDefault(kind: TypeKind, ctx: LoweringContext, context: string): string {
  switch (kind.kind) {
    case "type-ref": {
      const definition = ctx.types.get(kind.name);
      const declared = definition.kind;
      if (declared.kind === "struct") {
        if (declared.layout === "packed") {
          return `${ctx.mappings.requireDomain(definition.name, context)}.NONE`;
        }
        throw new LoweringError(`${context} holds an ${declared.layout} struct by value and has no default`, { context });
      }
      if (declared.kind === "enum") {
        return "0";
      }
      return pythonDefault(declared, ctx, `${context} (${kind.name})`);
    }
    case "array":
      return `(${pythonDefault(kind.element, ctx, `${context}[]`)},) * ${kind.length}`;
    case "bool":
      return "False";
    case "int":
      return "0";
    case "void":
      return "None";
    case "enum":
    case "struct":
      throw new InternalError(`Anonymous ${kind.kind} reached domain lowering at ${context}`, { context });
    case "pointer":
    case "float":
    case "opaque":
      throw new LoweringError(`${context} has type ${formatTypeKind(kind)}, which has no Python default`, { context });
    default:
      kind satisfies never;
      throw new LoweringError(`${context} has an unknown type kind`, { context });
  }
}
