import { LoweringError, type OperationDefinition } from "@wirebind/schema";
import type { OutputBuffer } from "../buffer";
import type { LoweringContext } from "../lowering/context";
import { ctypeWrapperName } from "../lowering/ctypes";
import { lowerToPython } from "../lowering/python";
import { toUpperAscii } from "../naming";

export type CallingConvention = "blocking" | "awaitable";

/** Emission order of the two mixins. */
export const CALLING_CONVENTIONS: readonly CallingConvention[] = ["awaitable", "blocking"];

/** Liveness operation; never exposed as a method. */
export const HEARTBEAT_OPERATION = "pulse";

export interface OperationNames {
  /** Mapped name of the operation enum. */
  operationEnum: string;
  /** Members hidden from the operation enum by its skip list. */
  hiddenMembers: readonly string[];
}

export interface MethodSignature {
  name: string;
  parameter: string;
  parameterType: string;
  returnType: string;
  /** `Operation.MEMBER` passed to `_submit`. */
  operationMember: string;
  /** The parameter, or the parameter wrapped in a one-element list for single-event operations. */
  submitArgument: string;
  eventWrapper: string;
  resultWrapper: string;
}

/** The shared signature both calling conventions render. */
export function buildMethodSignature(
  operation: OperationDefinition,
  ctx: LoweringContext,
  names: OperationNames
): MethodSignature {
  if (names.hiddenMembers.includes(operation.name)) {
    throw new LoweringError(
      `Operation '${operation.name}' is hidden from '${names.operationEnum}' and cannot be exposed as a method`,
      { operation: operation.name }
    );
  }

  const eventContext = `operation '${operation.name}' event`;
  const resultContext = `operation '${operation.name}' result`;
  const eventType = lowerToPython(operation.event, ctx, eventContext);
  const resultType = lowerToPython(operation.result, ctx, resultContext);
  const isBatch = operation.arity === "batch";

  return {
    name: operation.name,
    parameter: operation.eventName,
    parameterType: isBatch ? `list[${eventType}]` : eventType,
    returnType: `list[${resultType}]`,
    operationMember: `${names.operationEnum}.${toUpperAscii(operation.name)}`,
    submitArgument: isBatch ? operation.eventName : `[${operation.eventName}]`,
    eventWrapper: ctypeWrapperName(operation.event, ctx, eventContext),
    resultWrapper: ctypeWrapperName(operation.result, ctx, resultContext),
  };
}

export function mixinClassName(convention: CallingConvention): string {
  return convention === "awaitable" ? "AsyncStateMachineMixin" : "StateMachineMixin";
}

export function renderMethod(out: OutputBuffer, signature: MethodSignature, convention: CallingConvention): void {
  const isAsync = convention === "awaitable";
  out.line(
    `    ${isAsync ? "async " : ""}def ${signature.name}(self, ${signature.parameter}: ${signature.parameterType}) -> ${signature.returnType}:`
  );
  out.line(`        return ${isAsync ? "await " : ""}self._submit(`);
  out.line(`            ${signature.operationMember},`);
  out.line(`            ${signature.submitArgument},`);
  out.line(`            ${signature.eventWrapper},`);
  out.line(`            ${signature.resultWrapper},`);
  out.line("        )");
}

/** Signatures of every public operation, in declaration order. */
export function buildMethodSignatures(
  operations: readonly OperationDefinition[],
  ctx: LoweringContext,
  names: OperationNames
): MethodSignature[] {
  return operations
    .filter((operation) => operation.name !== HEARTBEAT_OPERATION)
    .map((operation) => buildMethodSignature(operation, ctx, names));
}

export function renderMixin(
  out: OutputBuffer,
  signatures: readonly MethodSignature[],
  convention: CallingConvention,
  operationEnum: string
): void {
  out.line(`class ${mixinClassName(convention)}:`);
  out.line(`    _submit: Callable[[${operationEnum}, Any, Any, Any], Any]`);
  for (const signature of signatures) {
    out.blank();
    renderMethod(out, signature, convention);
  }
  out.blank(2);
}
