import {
  composeSchemas,
  LoweringError,
  parseSchemaDocument,
  type ComposedSchema,
  type ResolvedMapping,
} from "@wirebind/schema";
import { OutputBuffer } from "./buffer";
import { resolveGeneratorOptions, type GeneratorOptions } from "./config";
import { renderDataclass } from "./emit/dataclasses";
import { buildEnumClass, renderEnumClass, resolveSkipList } from "./emit/enums";
import { buildMethodSignatures, CALLING_CONVENTIONS, renderMixin } from "./emit/methods";
import { renderNativeFunctions, renderPreamble } from "./emit/preamble";
import { buildStructBinding, renderStructBinding } from "./emit/structs";
import type { LoweringContext } from "./lowering/context";
import { lowerToCtype } from "./lowering/ctypes";
import { NOOP_LOGGER, type BindgenLogger } from "./logger";

export interface GenerateOptions extends GeneratorOptions {
  logger?: BindgenLogger;
}

/**
 * Generates the Python binding module for a composed schema.
 *
 * Output is assembled in memory and returned whole; any error aborts the run before a
 * single byte is handed back.
 */
export function generateBindings(schema: ComposedSchema, options: GenerateOptions = {}): string {
  const { logger = NOOP_LOGGER, ...rest } = options;
  const resolved = resolveGeneratorOptions(rest);
  const ctx: LoweringContext = { types: schema.types, mappings: schema.mappings };
  const mappings = schema.mappings.all();
  const out = new OutputBuffer();

  renderPreamble(out, {
    generatorName: resolved.generatorName,
    runtimeModule: resolved.runtimeModule,
    library: schema.client.library,
  });

  logger.debug("Emitting enums, flags and aliases", { count: mappings.length });
  for (const mapping of mappings) {
    emitDeclaration(out, mapping, ctx);
  }

  const records = schema.mappings.domainEntries().filter(isExternStruct);
  logger.debug("Emitting value records", { count: records.length });
  for (const { entry, definition } of records) {
    renderDataclass(out, definition, entry.name, ctx);
  }

  const bindings = mappings.filter(isExternStruct);
  logger.debug("Emitting structure bindings", { count: bindings.length });
  for (const { entry, definition, table } of bindings) {
    renderStructBinding(out, buildStructBinding(definition, entry.name, ctx, { withConverter: table === "domain" }));
  }

  const roles = schema.client.roles;
  logger.debug("Emitting native functions", { prefix: schema.client.symbolPrefix });
  renderNativeFunctions(out, schema.client, {
    status: schema.mappings.requireAll(roles.status, "client role 'status'"),
    packet: schema.mappings.requireAll(roles.packet, "client role 'packet'"),
    handle: schema.mappings.requireAll(roles.handle, "client role 'handle'"),
  });

  const operationEnum = schema.mappings.requireAll(roles.operation, "client role 'operation'");
  const operationDefinition = schema.types.get(roles.operation);
  const hiddenMembers = resolveSkipList(
    operationDefinition,
    schema.mappings.protocol.entry(roles.operation)?.skip ?? schema.mappings.domain.entry(roles.operation)?.skip
  );
  const signatures = buildMethodSignatures(schema.operations, ctx, { operationEnum, hiddenMembers });
  logger.debug("Emitting operation mixins", { methods: signatures.length });
  for (const convention of CALLING_CONVENTIONS) {
    renderMixin(out, signatures, convention, operationEnum);
  }

  const source = `${out.toString().trimEnd()}\n`;
  logger.info(`Generated bindings for ${schema.domain.name} v${schema.domain.version}`, {
    protocol: schema.protocol.name,
    declarations: mappings.length,
    methods: signatures.length * CALLING_CONVENTIONS.length,
  });
  return source;
}

/** Parses and composes both YAML documents, then generates. */
export function generateFromDocuments(protocolYaml: string, domainYaml: string, options: GenerateOptions = {}): string {
  const schema = composeSchemas(parseSchemaDocument(protocolYaml), parseSchemaDocument(domainYaml));
  return generateBindings(schema, options);
}

function emitDeclaration(out: OutputBuffer, mapping: ResolvedMapping, ctx: LoweringContext): void {
  const { entry, definition } = mapping;
  const kind = definition.kind;

  if (kind.kind === "struct") {
    switch (kind.layout) {
      case "extern":
        return;
      case "packed":
        renderEnumClass(out, buildEnumClass(definition, entry.name, resolveSkipList(definition, entry.skip)));
        return;
      case "auto":
        throw new LoweringError(`Struct '${definition.name}' has no defined layout and cannot be bound`, {
          typeName: definition.name,
        });
      default:
        kind.layout satisfies never;
        return;
    }
  }

  if (kind.kind === "enum") {
    renderEnumClass(out, buildEnumClass(definition, entry.name, resolveSkipList(definition, entry.skip)));
    return;
  }

  out.line(`${entry.name} = ${lowerToCtype(kind, ctx, definition.name)}`);
  out.blank();
}

function isExternStruct(mapping: ResolvedMapping): boolean {
  const kind = mapping.definition.kind;
  return kind.kind === "struct" && kind.layout === "extern";
}
