import { InternalError, SchemaValidationError, type TypeDefinition } from "@wirebind/schema";
import type { OutputBuffer } from "../buffer";
import { toUpperAscii } from "../naming";

/** Skip list applied to packed structs whose mapping does not carry one. */
export const DEFAULT_PACKED_SKIP: readonly string[] = ["padding"];

export interface EnumMember {
  name: string;
  value: bigint;
  /** Python source for the value. */
  expression: string;
}

export interface EnumClass {
  name: string;
  base: "enum.IntEnum" | "enum.IntFlag";
  members: EnumMember[];
}

/**
 * Builds the Python class for an enum (`IntEnum`) or a packed struct (`IntFlag`).
 *
 * Flag bits follow the field's position among all declared fields, skipped ones included,
 * so changing a skip list never moves another flag.
 */
export function buildEnumClass(definition: TypeDefinition, name: string, skip: readonly string[]): EnumClass {
  const kind = definition.kind;

  if (kind.kind === "enum") {
    ensureSkipNamesExist(definition.name, skip, kind.variants.map((variant) => variant.name));
    return {
      name,
      base: "enum.IntEnum",
      members: kind.variants
        .filter((variant) => !skip.includes(variant.name))
        .map((variant) => ({
          name: toUpperAscii(variant.name),
          value: variant.value,
          expression: variant.value.toString(),
        })),
    };
  }

  if (kind.kind === "struct" && kind.layout === "packed") {
    ensureSkipNamesExist(definition.name, skip, kind.fields.map((field) => field.name));
    const members: EnumMember[] = [{ name: "NONE", value: 0n, expression: "0" }];
    kind.fields.forEach((field, index) => {
      if (skip.includes(field.name)) {
        return;
      }
      members.push({
        name: toUpperAscii(field.name),
        value: 1n << BigInt(index),
        expression: `1 << ${index}`,
      });
    });
    return { name, base: "enum.IntFlag", members };
  }

  throw new InternalError(`Type '${definition.name}' is neither an enum nor a packed struct`, {
    typeName: definition.name,
  });
}

export function renderEnumClass(out: OutputBuffer, model: EnumClass): void {
  out.line(`class ${model.name}(${model.base}):`);
  if (model.members.length === 0) {
    out.line("    pass");
  }
  for (const member of model.members) {
    out.line(`    ${member.name} = ${member.expression}`);
  }
  out.blank(2);
}

function ensureSkipNamesExist(typeName: string, skip: readonly string[], declared: string[]) {
  for (const name of skip) {
    if (!declared.includes(name)) {
      throw new SchemaValidationError(`Skip list for '${typeName}' names '${name}', which '${typeName}' does not declare`, {
        typeName,
        skip: name,
      });
    }
  }
}

/** Explicit skip list from the mapping, else the packed-struct default for the fields it has. */
export function resolveSkipList(definition: TypeDefinition, skip: readonly string[] | undefined): readonly string[] {
  if (skip !== undefined) {
    return skip;
  }
  const kind = definition.kind;
  if (kind.kind === "struct" && kind.layout === "packed") {
    return DEFAULT_PACKED_SKIP.filter((name) => kind.fields.some((field) => field.name === name));
  }
  return [];
}
