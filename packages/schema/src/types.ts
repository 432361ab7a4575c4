/**
 * Native type model shared by schema documents, the builder API and the generators.
 *
 * Declarations (`TypeDefinition`) carry the native identity; everything nested inside a
 * declaration is structural and refers to other declarations through `type-ref`.
 */

export type StructLayout = "extern" | "packed" | "auto";

export type TypeKind =
  | BoolType
  | IntType
  | FloatType
  | VoidType
  | OpaqueType
  | ArrayType
  | PointerType
  | EnumType
  | StructType
  | TypeRefType;

export interface BoolType {
  kind: "bool";
}

export interface IntType {
  kind: "int";
  bits: number;
  signed: boolean;
}

export interface FloatType {
  kind: "float";
  bits: number;
}

export interface VoidType {
  kind: "void";
}

/** Untyped pointee (`anyopaque`). Only meaningful behind a pointer. */
export interface OpaqueType {
  kind: "opaque";
}

export interface ArrayType {
  kind: "array";
  element: TypeKind;
  length: number;
}

export interface PointerType {
  kind: "pointer";
  pointee: TypeKind;
  nullable: boolean;
}

export interface EnumVariant {
  name: string;
  value: bigint;
}

export interface EnumType {
  kind: "enum";
  tagBits: number;
  variants: EnumVariant[];
}

export interface StructField {
  name: string;
  type: TypeKind;
  /** Occupies layout space but is never exposed to constructors, converters or value records. */
  reserved: boolean;
}

export interface StructType {
  kind: "struct";
  layout: StructLayout;
  fields: StructField[];
}

export interface TypeRefType {
  kind: "type-ref";
  name: string;
}

export interface TypeDefinition {
  name: string;
  kind: TypeKind;
}

export type OperationArity = "single" | "batch";

export interface OperationDefinition {
  /** Operation name; also the generated method name and, uppercased, the operation enum member. */
  name: string;
  arity: OperationArity;
  event: TypeKind;
  result: TypeKind;
  /** Name of the generated method parameter. */
  eventName: string;
}

export interface MappingEntry {
  /** Native declaration name. */
  type: string;
  /** Name the declaration receives in generated output. */
  name: string;
  /** Enum variants or flag fields hidden from the generated class. */
  skip?: string[];
}

export interface SchemaMetadata {
  name: string;
  version: number;
  description?: string;
}

/** Lifecycle roles a protocol document assigns to its declarations. */
export interface ClientRoles {
  operation: string;
  status: string;
  packet: string;
  handle: string;
}

export interface ClientLibrary {
  /** Name of the loaded native library handle exported by the runtime module. */
  library: string;
  symbolPrefix: string;
  roles: ClientRoles;
}

export interface SchemaDocument {
  metadata: SchemaMetadata;
  types: TypeDefinition[];
  mappings: MappingEntry[];
  operations: OperationDefinition[];
  client?: ClientLibrary;
}

export function isUnsignedInt(kind: TypeKind): kind is IntType {
  return kind.kind === "int" && !kind.signed;
}
