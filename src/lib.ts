export { mayAlias, objectTypeOf } from "./alias.js";
export type { MemoryLocation, TypeTable } from "./alias.js";
export { Block } from "./block.js";
export type { BlockLike, NewInstruction, Operand } from "./block.js";
export {
  InterpreterError,
  IrError,
  MalformedInstructionError,
  MalformedReferenceError,
  UnknownOpcodeError,
} from "./errors.js";
export { toFixpoint } from "./fixpoint.js";
export type { BlockPass } from "./fixpoint.js";
export { interpret, objectHandle } from "./interpret.js";
export type { ObjectHandle, RuntimeValue } from "./interpret.js";
export * from "./ir.js";
export {
  optimizeLoadStore,
  optimizeLoadStoreWithReport,
} from "./load-store.js";
export type { LoadStoreReport, LoadStoreResult } from "./load-store.js";
export { blockToString, opName } from "./print.js";
export { parseBlock, serializeBlock } from "./serialize.js";
export type { JsonArg, JsonBlock, JsonInstruction } from "./serialize.js";
