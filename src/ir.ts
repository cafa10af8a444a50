/**
 * Object types known to the alias analysis. `unknown` is the conservative
 * default for values whose provenance is not a typed allocation.
 */
export type ObjectType =
  | "unknown"
  | "array"
  | "hash"
  | "string"
  | "integer"
  | "float"
  | "symbol"
  | "range"
  | "regexp";

export const OBJECT_TYPES: readonly ObjectType[] = [
  "unknown",
  "array",
  "hash",
  "string",
  "integer",
  "float",
  "symbol",
  "range",
  "regexp",
];

/**
 * A reference to the instruction that produced a value. The index of the
 * instruction within its block is its identity.
 */
export interface InstrRef {
  kind: "ref";
  id: number;
}

export type Literal = number | string;

export interface Constant {
  kind: "const";
  value: Literal;
}

export type Value = InstrRef | Constant;

export interface AllocObject {
  op: "alloc";
  id: number;
  type: ObjectType;
}

export interface GetArg {
  op: "getarg";
  id: number;
  index: number;
}

export interface Load {
  op: "load";
  id: number;
  object: Value;
  offset: number;
}

export interface Store {
  op: "store";
  id: number;
  object: Value;
  offset: number;
  value: Value;
}

export interface Escape {
  op: "escape";
  id: number;
  value: Value;
}

export type ArithOp = "add" | "mul" | "lshift";

export const ARITH_OPS: readonly ArithOp[] = ["add", "mul", "lshift"];

export interface Arith {
  op: ArithOp;
  id: number;
  args: [Value, Value];
}

export type Instruction = AllocObject | GetArg | Load | Store | Escape | Arith;

export type Opcode = Instruction["op"];

/**
 * Whether later instructions may refer to the instruction's result.
 */
export function hasResult(instr: Instruction): boolean {
  return instr.op !== "store" && instr.op !== "escape";
}

export function ref(id: number): InstrRef {
  return { kind: "ref", id };
}

export function constant(value: Literal): Constant {
  return { kind: "const", value };
}

/**
 * Identity equality: references are equal when they name the same
 * instruction, constants when their literals are equal under `Object.is`,
 * so NaN matches NaN and -0 does not match 0.
 */
export function sameValue(a: Value | undefined, b: Value): boolean {
  if (a === undefined) {
    return false;
  }

  if (a.kind === "const" && b.kind === "const") {
    return Object.is(a.value, b.value);
  }

  return a.kind === "ref" && b.kind === "ref" && a.id === b.id;
}

/**
 * A string that is equal for two values exactly when `sameValue` holds.
 */
export function valueKey(value: Value): string {
  if (value.kind === "ref") {
    return `%${value.id}`;
  }

  if (Object.is(value.value, -0)) {
    return "#-0";
  }

  return typeof value.value === "number"
    ? `#${value.value}`
    : `$${JSON.stringify(value.value)}`;
}

/**
 * The operands an instruction reads, in rendering order.
 */
export function operands(instr: Instruction): Value[] {
  switch (instr.op) {
    case "alloc":
    case "getarg":
      return [];
    case "load":
      return [instr.object];
    case "store":
      return [instr.object, instr.value];
    case "escape":
      return [instr.value];
    default:
      return [...instr.args];
  }
}
