import { SchemaValidationError } from "./errors";
import type { EnumType, StructType, TypeDefinition, TypeKind } from "./types";

/** Declarations by name. Every name in a run resolves to exactly one declaration. */
export class TypeRegistry {
  private readonly byName: Map<string, TypeDefinition>;

  constructor(definitions: Iterable<TypeDefinition>) {
    this.byName = new Map();
    for (const definition of definitions) {
      this.declare(definition);
    }
  }

  get(typeName: string): TypeDefinition {
    const definition = this.byName.get(typeName);
    if (definition === undefined) {
      throw new SchemaValidationError(`Type '${typeName}' is not declared in any loaded schema`, { typeName });
    }
    return definition;
  }

  has(typeName: string): boolean {
    return this.byName.has(typeName);
  }

  entries(): IterableIterator<[string, TypeDefinition]> {
    return this.byName.entries();
  }

  get size(): number {
    return this.byName.size;
  }

  private declare(definition: TypeDefinition) {
    if (this.byName.has(definition.name)) {
      throw new SchemaValidationError(`Duplicate type definition '${definition.name}'`, { typeName: definition.name });
    }
    this.byName.set(definition.name, definition);
  }
}

/** Builds the registry and validates every declaration against it. */
export function buildTypeRegistry(definitions: Iterable<TypeDefinition>): TypeRegistry {
  const registry = new TypeRegistry(definitions);
  const dependencies = new Map<string, Set<string>>();
  for (const [typeName, definition] of registry.entries()) {
    dependencies.set(typeName, validateDeclaration(definition, registry));
  }
  assertNoValueCycles(dependencies);
  return registry;
}

/** Validates one declaration and returns the declarations it contains by value. */
function validateDeclaration(type: TypeDefinition, registry: TypeRegistry): Set<string> {
  const valueRefs = new Set<string>();
  switch (type.kind.kind) {
    case "struct":
      validateStruct(type.kind, registry, type.name, valueRefs);
      break;
    case "enum":
      validateEnum(type.kind, type.name);
      break;
    default:
      validateTypeKind(type.kind, registry, type.name, valueRefs);
  }
  return valueRefs;
}

function validateStruct(struct: StructType, registry: TypeRegistry, context: string, valueRefs: Set<string>) {
  const seen = new Set<string>();
  for (const field of struct.fields) {
    if (seen.has(field.name)) {
      throw new SchemaValidationError(`Struct '${context}' declares field '${field.name}' more than once`, {
        typeName: context,
        field: field.name,
      });
    }
    seen.add(field.name);
    validateTypeKind(field.type, registry, `${context}.${field.name}`, valueRefs);
  }
}

function validateEnum(enumType: EnumType, context: string) {
  if (!Number.isSafeInteger(enumType.tagBits) || enumType.tagBits <= 0) {
    throw new SchemaValidationError(`Enum '${context}' must have a positive tag width`, { typeName: context });
  }
  if (enumType.variants.length === 0) {
    throw new SchemaValidationError(`Enum '${context}' must include at least one variant`, { typeName: context });
  }

  const limit = 1n << BigInt(enumType.tagBits);
  const names = new Set<string>();
  const values = new Map<bigint, string>();
  for (const variant of enumType.variants) {
    if (names.has(variant.name)) {
      throw new SchemaValidationError(`Enum '${context}' declares variant '${variant.name}' more than once`, {
        typeName: context,
        variant: variant.name,
      });
    }
    names.add(variant.name);

    if (variant.value < 0n || variant.value >= limit) {
      throw new SchemaValidationError(
        `Variant '${variant.name}' in enum '${context}' does not fit in u${enumType.tagBits}`,
        { typeName: context, variant: variant.name, value: variant.value.toString() }
      );
    }

    const existing = values.get(variant.value);
    if (existing !== undefined) {
      throw new SchemaValidationError(
        `Variants '${existing}' and '${variant.name}' in enum '${context}' share the value ${variant.value}`,
        { typeName: context, variant: variant.name }
      );
    }
    values.set(variant.value, variant.name);
  }
}

/**
 * Checks that a structural type only references declared names. When `valueRefs` is given,
 * names held by value are added to it; names behind a pointer are not.
 */
export function validateTypeKind(kind: TypeKind, registry: TypeRegistry, context: string, valueRefs?: Set<string>) {
  switch (kind.kind) {
    case "type-ref":
      if (!registry.has(kind.name)) {
        throw new SchemaValidationError(`Type '${context}' references unknown type '${kind.name}'`, {
          typeName: context,
          referencedType: kind.name,
        });
      }
      valueRefs?.add(kind.name);
      break;
    case "array":
      if (!Number.isSafeInteger(kind.length) || kind.length <= 0) {
        throw new SchemaValidationError(`Array in '${context}' must have a positive length`, { typeName: context });
      }
      validateTypeKind(kind.element, registry, `${context}[]`, valueRefs);
      break;
    case "pointer":
      validateTypeKind(kind.pointee, registry, `${context}.*`);
      break;
    case "enum":
    case "struct":
      throw new SchemaValidationError(`Anonymous ${kind.kind} in '${context}' must be declared and referenced by name`, {
        typeName: context,
      });
    case "int":
    case "float":
    case "bool":
    case "void":
    case "opaque":
      break;
    default:
      kind satisfies never;
  }
}

/** A declaration may not contain itself by value, directly or through others. */
function assertNoValueCycles(dependencies: Map<string, Set<string>>) {
  const finished = new Set<string>();
  const path: string[] = [];

  const walk = (typeName: string): void => {
    if (finished.has(typeName)) {
      return;
    }
    const open = path.indexOf(typeName);
    if (open !== -1) {
      const cyclePath = [...path.slice(open), typeName];
      throw new SchemaValidationError(`Cyclic type reference detected: ${cyclePath.join(" -> ")}`, { cycle: cyclePath });
    }

    path.push(typeName);
    for (const dependency of dependencies.get(typeName) ?? []) {
      walk(dependency);
    }
    path.pop();
    finished.add(typeName);
  };

  for (const typeName of dependencies.keys()) {
    walk(typeName);
  }
}
