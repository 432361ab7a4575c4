import {
  formatTypeKind,
  InternalError,
  LoweringError,
  type StructField,
  type TypeDefinition,
} from "@wirebind/schema";
import type { OutputBuffer } from "../buffer";
import { ctypeStructName, WIDE_INT_CTYPE } from "../naming";
import { resolveType, underlyingKind, type LoweringContext } from "../lowering/context";
import { isWideInt, lowerToCtype } from "../lowering/ctypes";

export interface BoundsCheck {
  field: string;
  bits: number;
}

export interface StructBinding {
  className: string;
  /** Mapped name of the value record, when the struct has one. */
  recordName?: string;
  boundsChecks: BoundsCheck[];
  /** `keyword=expression` pairs passed to `cls(...)` in `from_param`. */
  constructorArgs: Array<[string, string]>;
  /** `keyword=expression` pairs passed to the value record in `to_python`. */
  converterArgs: Array<[string, string]>;
  /** Every declared field with its ctypes type, in declaration order. */
  layout: Array<[string, string]>;
}

/**
 * Builds the `ctypes.Structure` binding for an extern struct.
 *
 * `from_param` validates every exposed integer narrower than 128 bits before constructing,
 * since the stock ctypes integers truncate silently. The 128-bit wrapper validates itself.
 */
export function buildStructBinding(
  definition: TypeDefinition,
  name: string,
  ctx: LoweringContext,
  options: { withConverter: boolean }
): StructBinding {
  const kind = definition.kind;
  if (kind.kind !== "struct" || kind.layout !== "extern") {
    throw new InternalError(`Structure bindings are only generated for extern structs, not '${definition.name}'`, {
      typeName: definition.name,
    });
  }

  const exposed = kind.fields.filter((field) => !field.reserved);
  const binding: StructBinding = {
    className: ctypeStructName(name),
    boundsChecks: [],
    constructorArgs: [],
    converterArgs: [],
    layout: [],
  };

  for (const field of exposed) {
    const check = boundsCheckFor(definition.name, field, ctx);
    if (check) {
      binding.boundsChecks.push(check);
    }
    const source = `obj.${field.name}`;
    binding.constructorArgs.push([field.name, isWideInt(field.type, ctx) ? `${WIDE_INT_CTYPE}.from_param(${source})` : source]);
  }

  if (options.withConverter) {
    binding.recordName = name;
    binding.converterArgs = exposed.map((field) => [field.name, convertToPython(field, ctx)]);
  }

  binding.layout = kind.fields.map((field) => [
    field.name,
    lowerToCtype(field.type, ctx, `${definition.name}.${field.name}`),
  ]);

  return binding;
}

export function renderStructBinding(out: OutputBuffer, binding: StructBinding): void {
  out.line(`class ${binding.className}(ctypes.Structure):`);
  out.line("    @classmethod");
  out.line("    def from_param(cls, obj):");
  for (const check of binding.boundsChecks) {
    out.line(`        validate_uint(bits=${check.bits}, name="${check.field}", number=obj.${check.field})`);
  }
  out.line("        return cls(");
  for (const [keyword, expression] of binding.constructorArgs) {
    out.line(`            ${keyword}=${expression},`);
  }
  out.line("        )");

  if (binding.recordName !== undefined) {
    out.blank();
    out.line("    def to_python(self):");
    out.line(`        return ${binding.recordName}(`);
    for (const [keyword, expression] of binding.converterArgs) {
      out.line(`            ${keyword}=${expression},`);
    }
    out.line("        )");
  }

  out.blank(2);
  out.line(`${binding.className}._fields_ = [ # noqa: SLF001`);
  for (const [fieldName, ctype] of binding.layout) {
    out.line(`    ("${fieldName}", ${ctype}),`);
  }
  out.line("]");
  out.blank(2);
}

function boundsCheckFor(structName: string, field: StructField, ctx: LoweringContext): BoundsCheck | undefined {
  const resolved = underlyingKind(field.type, ctx);
  if (resolved.kind !== "int") {
    return undefined;
  }
  if (resolved.signed) {
    throw new LoweringError(
      `Field '${field.name}' of struct '${structName}' is a signed integer (${formatTypeKind(resolved)}); only unsigned integers are supported`,
      { typeName: structName, field: field.name }
    );
  }
  if (resolved.bits === 128) {
    return undefined;
  }
  return { field: field.name, bits: resolved.bits };
}

/** Wraps enum and struct fields in their domain class, looking through aliases as `lowerToPython` does. */
function convertToPython(field: StructField, ctx: LoweringContext): string {
  const source = `self.${field.name}`;
  const resolved = resolveType(field.type, ctx);
  const isDeclaration = resolved.kind.kind === "enum" || resolved.kind.kind === "struct";
  const domainName =
    isDeclaration && resolved.declaration !== undefined ? ctx.mappings.lookupDomain(resolved.declaration) : undefined;
  if (domainName !== undefined) {
    return `${domainName}(${source})`;
  }
  if (isWideInt(field.type, ctx)) {
    return `${source}.to_python()`;
  }
  return source;
}
