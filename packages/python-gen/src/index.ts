export { OutputBuffer } from "./buffer";
export {
  BUILTIN_DOMAIN_SCHEMA_PATH,
  BUILTIN_PROTOCOL_SCHEMA_PATH,
  readBuiltinDomainSchema,
  readBuiltinProtocolSchema,
} from "./builtin";
export { parseArgs, runCli } from "./cli";
export type { CliIo } from "./cli";
export {
  cliOptionsSchema,
  generatorOptionsSchema,
  LOG_LEVELS,
  resolveCliOptions,
  resolveGeneratorOptions,
} from "./config";
export type { CliOptions, GeneratorOptions, ResolvedCliOptions, ResolvedGeneratorOptions } from "./config";
export { buildDataclassFields, renderDataclass } from "./emit/dataclasses";
export type { DataclassField } from "./emit/dataclasses";
export { buildEnumClass, DEFAULT_PACKED_SKIP, renderEnumClass, resolveSkipList } from "./emit/enums";
export type { EnumClass, EnumMember } from "./emit/enums";
export {
  buildMethodSignature,
  buildMethodSignatures,
  CALLING_CONVENTIONS,
  HEARTBEAT_OPERATION,
  mixinClassName,
  renderMethod,
  renderMixin,
} from "./emit/methods";
export type { CallingConvention, MethodSignature, OperationNames } from "./emit/methods";
export { renderHeaderBox, renderNativeFunctions, renderPreamble, runtimeImports } from "./emit/preamble";
export type { PreambleOptions, RoleNames } from "./emit/preamble";
export { buildStructBinding, renderStructBinding } from "./emit/structs";
export type { BoundsCheck, StructBinding } from "./emit/structs";
export { generateBindings, generateFromDocuments } from "./generator";
export type { GenerateOptions } from "./generator";
export { createConsoleLogger, NOOP_LOGGER } from "./logger";
export type { BindgenLogger, LogLevel } from "./logger";
export { resolveType, underlyingKind } from "./lowering/context";
export type { LoweringContext, ResolvedType } from "./lowering/context";
export { ctypeWrapperName, isWideInt, lowerToCtype, lowerUnsigned } from "./lowering/ctypes";
export { lowerToPython, pythonDefault } from "./lowering/python";
export { ctypeStructName, CTYPE_STRUCT_PREFIX, toUpperAscii, WIDE_INT_CTYPE } from "./naming";
