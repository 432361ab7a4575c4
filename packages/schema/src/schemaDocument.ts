import YAML from "yaml";
import { SchemaParseError, SchemaValidationError } from "./errors";
import { parseTypeExpression } from "./typeExpression";
import type {
  ClientLibrary,
  EnumType,
  MappingEntry,
  OperationArity,
  OperationDefinition,
  SchemaDocument,
  SchemaMetadata,
  StructLayout,
  StructType,
  TypeDefinition,
  TypeKind,
} from "./types";

const STRUCT_LAYOUTS: readonly StructLayout[] = ["extern", "packed", "auto"];
const OPERATION_ARITIES: readonly OperationArity[] = ["single", "batch"];
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function parseSchemaDocument(yamlText: string): SchemaDocument {
  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlText, { intAsBigInt: true });
  } catch (error) {
    throw new SchemaParseError("Failed to parse schema YAML", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const root = requireRecord(parsed, "schema document");
  const metadata = parseMetadata(requireRecord(root.schema, "schema metadata"));

  const typesNode = root.types ?? [];
  if (!Array.isArray(typesNode)) {
    throw new SchemaValidationError("Schema 'types' must be an array");
  }
  const mappingsNode = root.mappings ?? [];
  if (!Array.isArray(mappingsNode)) {
    throw new SchemaValidationError("Schema 'mappings' must be an array");
  }
  const operationsNode = root.operations ?? [];
  if (!Array.isArray(operationsNode)) {
    throw new SchemaValidationError("Schema 'operations' must be an array");
  }

  const document: SchemaDocument = {
    metadata,
    types: typesNode.map((entry, index) => parseTypeDefinition(entry, index)),
    mappings: mappingsNode.map((entry, index) => parseMapping(entry, index)),
    operations: operationsNode.map((entry, index) => parseOperation(entry, index)),
  };

  if (root.client !== undefined) {
    document.client = parseClient(requireRecord(root.client, "client"));
  }

  return document;
}

function parseMetadata(node: Record<string, unknown>): SchemaMetadata {
  const name = requireString(node.name, "schema.name");
  const versionRaw = node.version;
  if (versionRaw === undefined || versionRaw === null) {
    throw new SchemaValidationError("schema.version is required");
  }
  const version = Number(versionRaw);
  if (!Number.isSafeInteger(version)) {
    throw new SchemaValidationError("schema.version must be an integer");
  }

  const metadata: SchemaMetadata = { name, version };
  if (typeof node.description === "string") {
    metadata.description = node.description;
  }
  return metadata;
}

function parseClient(node: Record<string, unknown>): ClientLibrary {
  const roles = requireRecord(node.roles, "client.roles");
  return {
    library: requireIdentifier(node.library, "client.library"),
    symbolPrefix: requireIdentifier(node["symbol-prefix"], "client.symbol-prefix"),
    roles: {
      operation: requireString(roles.operation, "client.roles.operation"),
      status: requireString(roles.status, "client.roles.status"),
      packet: requireString(roles.packet, "client.roles.packet"),
      handle: requireString(roles.handle, "client.roles.handle"),
    },
  };
}

function parseTypeDefinition(entry: unknown, index: number): TypeDefinition {
  const node = requireRecord(entry, `types[${index}]`);
  const name = requireIdentifier(node.name, `types[${index}].name`);
  const kindNode = requireRecord(node.kind, `kind of type '${name}'`);

  const keys = Object.keys(kindNode);
  if (keys.length !== 1) {
    throw new SchemaValidationError(`Type '${name}' kind must be a single-entry object`);
  }
  const key = keys[0];
  const value = kindNode[key];

  switch (key) {
    case "enum":
      return { name, kind: parseEnumType(requireRecord(value, `enum for ${name}`), name) };
    case "struct":
      return { name, kind: parseStructType(requireRecord(value, `struct for ${name}`), name) };
    case "alias":
      return { name, kind: parseTypeExpression(requireString(value, `alias for ${name}`), name) };
    default:
      throw new SchemaValidationError(`Type '${name}' uses unsupported kind '${key}'`);
  }
}

function parseEnumType(node: Record<string, unknown>, context: string): EnumType {
  const tag = parseTypeExpression(requireString(node.tag, `enum '${context}' tag`), `enum '${context}' tag`);
  if (tag.kind !== "int" || tag.signed) {
    throw new SchemaValidationError(`Enum '${context}' must use an unsigned integer tag`);
  }

  const variantsNode = node.variants;
  if (!Array.isArray(variantsNode) || variantsNode.length === 0) {
    throw new SchemaValidationError(`Enum '${context}' must include at least one variant`);
  }

  const variants = variantsNode.map((variantNode, index) => {
    const variant = requireRecord(variantNode, `variant ${index} in enum '${context}'`);
    const name = requireIdentifier(variant.name, `variant ${index} name in enum '${context}'`);
    const raw = variant.value;
    if (typeof raw !== "bigint" && typeof raw !== "number") {
      throw new SchemaValidationError(`Variant '${name}' in enum '${context}' must define an integer 'value'`);
    }
    if (typeof raw === "number" && !Number.isSafeInteger(raw)) {
      throw new SchemaValidationError(`Variant '${name}' in enum '${context}' has invalid value`);
    }
    return { name, value: BigInt(raw) };
  });

  return { kind: "enum", tagBits: tag.bits, variants };
}

function parseStructType(node: Record<string, unknown>, context: string): StructType {
  const layoutRaw = node.layout ?? "extern";
  const layout = STRUCT_LAYOUTS.find((candidate) => candidate === layoutRaw);
  if (layout === undefined) {
    throw new SchemaValidationError(`Struct '${context}' has unknown layout '${String(layoutRaw)}'`);
  }

  const fieldsNode = node.fields;
  if (!Array.isArray(fieldsNode)) {
    throw new SchemaValidationError(`Struct '${context}' must define a 'fields' array`);
  }

  const fields = fieldsNode.map((fieldNode, index) => {
    const field = requireRecord(fieldNode, `field ${index} in struct '${context}'`);
    const name = requireIdentifier(field.name, `field ${index} name in struct '${context}'`);
    const type = parseTypeExpression(
      requireString(field.type, `type of field '${name}' in struct '${context}'`),
      `${context}.${name}`
    );
    let reserved = name === "reserved";
    const reservedRaw = field.reserved;
    if (reservedRaw !== undefined) {
      if (typeof reservedRaw !== "boolean") {
        throw new SchemaValidationError(`Field '${name}' in struct '${context}' has a non-boolean 'reserved' flag`);
      }
      reserved = reservedRaw;
    }
    return { name, type, reserved };
  });

  return { kind: "struct", layout, fields };
}

function parseMapping(entry: unknown, index: number): MappingEntry {
  const node = requireRecord(entry, `mappings[${index}]`);
  const mapping: MappingEntry = {
    type: requireIdentifier(node.type, `mappings[${index}].type`),
    name: requireIdentifier(node.name, `mappings[${index}].name`),
  };

  if (node.skip !== undefined) {
    if (!Array.isArray(node.skip)) {
      throw new SchemaValidationError(`mappings[${index}].skip must be an array of names`);
    }
    mapping.skip = node.skip.map((name, skipIndex) => requireIdentifier(name, `mappings[${index}].skip[${skipIndex}]`));
  }
  return mapping;
}

function parseOperation(entry: unknown, index: number): OperationDefinition {
  const node = requireRecord(entry, `operations[${index}]`);
  const name = requireIdentifier(node.name, `operations[${index}].name`);
  const arity = OPERATION_ARITIES.find((candidate) => candidate === node.arity);
  if (arity === undefined) {
    throw new SchemaValidationError(`Operation '${name}' must declare arity 'single' or 'batch'`);
  }

  const event: TypeKind = parseTypeExpression(requireString(node.event, `operation '${name}' event`), `operation '${name}' event`);
  const result: TypeKind = parseTypeExpression(
    requireString(node.result, `operation '${name}' result`),
    `operation '${name}' result`
  );

  return {
    name,
    arity,
    event,
    result,
    eventName: requireIdentifier(node["event-name"], `operation '${name}' event-name`),
  };
}

function requireRecord(value: unknown, context: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new SchemaValidationError(`${context} must be an object`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, context: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new SchemaValidationError(`${context} must be a non-empty string`);
  }
  return value;
}

function requireIdentifier(value: unknown, context: string): string {
  const text = requireString(value, context);
  if (!IDENTIFIER_PATTERN.test(text)) {
    throw new SchemaValidationError(`${context} must be an identifier, got '${text}'`);
  }
  return text;
}
