import { InternalError, type TypeDefinition } from "@wirebind/schema";
import type { OutputBuffer } from "../buffer";
import type { LoweringContext } from "../lowering/context";
import { lowerToPython, pythonDefault } from "../lowering/python";

export interface DataclassField {
  name: string;
  annotation: string;
  defaultValue: string;
}

/** Value record fields of an extern struct: declaration order, reserved fields left out. */
export function buildDataclassFields(definition: TypeDefinition, ctx: LoweringContext): DataclassField[] {
  const kind = definition.kind;
  if (kind.kind !== "struct" || kind.layout !== "extern") {
    throw new InternalError(`Value records are only generated for extern structs, not '${definition.name}'`, {
      typeName: definition.name,
    });
  }

  return kind.fields
    .filter((field) => !field.reserved)
    .map((field) => {
      const context = `${definition.name}.${field.name}`;
      return {
        name: field.name,
        annotation: lowerToPython(field.type, ctx, context),
        defaultValue: pythonDefault(field.type, ctx, context),
      };
    });
}

export function renderDataclass(out: OutputBuffer, definition: TypeDefinition, name: string, ctx: LoweringContext): void {
  const fields = buildDataclassFields(definition, ctx);

  out.line("@dataclass");
  out.line(`class ${name}:`);
  if (fields.length === 0) {
    out.line("    pass");
  }
  for (const field of fields) {
    out.line(`    ${field.name}: ${field.annotation} = ${field.defaultValue}`);
  }
  out.blank(2);
}
