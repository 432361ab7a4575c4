import { InternalError, type MappingRegistry, type TypeKind, type TypeRegistry } from "@wirebind/schema";

export interface LoweringContext {
  types: TypeRegistry;
  mappings: MappingRegistry;
}

export interface ResolvedType {
  /** Structural kind at the end of the alias chain. */
  kind: TypeKind;
  /** Declaration that owns `kind`, when the input was a reference. */
  declaration?: string;
}

/**
 * Follows alias declarations down to a structural kind. Enum and struct declarations stop
 * the walk; their name is what mapping lookups need.
 */
export function resolveType(kind: TypeKind, ctx: LoweringContext): ResolvedType {
  let current = kind;
  let declaration: string | undefined;
  const seen = new Set<string>();
  while (current.kind === "type-ref") {
    if (seen.has(current.name)) {
      throw new InternalError(`Alias '${current.name}' resolves to itself`, { typeName: current.name });
    }
    seen.add(current.name);
    declaration = current.name;
    current = ctx.types.get(current.name).kind;
  }
  return declaration === undefined ? { kind: current } : { kind: current, declaration };
}

export function underlyingKind(kind: TypeKind, ctx: LoweringContext): TypeKind {
  return resolveType(kind, ctx).kind;
}
