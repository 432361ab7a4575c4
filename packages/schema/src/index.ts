export {
  BindgenError,
  InternalError,
  LoweringError,
  SchemaParseError,
  SchemaValidationError,
  UnmappedTypeError,
} from "./errors";
export type { BindgenErrorCode } from "./errors";
export {
  defineAlias,
  defineEnum,
  defineExtern,
  defineOperation,
  definePacked,
  defineStruct,
  field,
  n,
  reserved,
  toTypeKind,
} from "./define";
export type { NativeTypeBuilder, OperationInput, TypeInput } from "./define";
export { composeSchemas } from "./compose";
export type { ComposedSchema } from "./compose";
export { packedBitSize, packedStructBitSize } from "./layout";
export { MappingRegistry, MappingTable } from "./mappings";
export type { MappingTableKind, ResolvedMapping } from "./mappings";
export { parseSchemaDocument } from "./schemaDocument";
export { formatTypeKind, MAX_INT_BITS, parseTypeExpression } from "./typeExpression";
export { buildTypeRegistry, TypeRegistry, validateTypeKind } from "./typeRegistry";
export { isUnsignedInt } from "./types";
export type {
  ArrayType,
  BoolType,
  ClientLibrary,
  ClientRoles,
  EnumType,
  EnumVariant,
  FloatType,
  IntType,
  MappingEntry,
  OpaqueType,
  OperationArity,
  OperationDefinition,
  PointerType,
  SchemaDocument,
  SchemaMetadata,
  StructField,
  StructLayout,
  StructType,
  TypeDefinition,
  TypeKind,
  TypeRefType,
  VoidType,
} from "./types";
