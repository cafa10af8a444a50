import type { BlockLike } from "./block.js";
import { InterpreterError, unknownOpcode } from "./errors.js";
import type { ArithOp, Value } from "./ir.js";

export interface ObjectHandle {
  kind: "object";
  label: string;
}

export type RuntimeValue = number | string | ObjectHandle;

export function objectHandle(label: string): ObjectHandle {
  return { kind: "object", label };
}

/**
 * A heap of objects, each mapping field offsets to values.
 */
class Heap {
  private readonly storage = new Map<string, Map<number, RuntimeValue>>();

  read(object: ObjectHandle, offset: number): RuntimeValue {
    // Slots nobody wrote hold a placeholder naming the slot, so two runs over
    // the same arguments observe the same initial memory.
    return (
      this.storage.get(object.label)?.get(offset) ??
      `${object.label}[${offset}]`
    );
  }

  write(object: ObjectHandle, offset: number, value: RuntimeValue) {
    let fields = this.storage.get(object.label);

    if (fields === undefined) {
      fields = new Map();
      this.storage.set(object.label, fields);
    }

    fields.set(offset, value);
  }
}

function describe(value: RuntimeValue): string {
  return typeof value === "object" ? `<${value.label}>` : JSON.stringify(value);
}

function asObject(value: RuntimeValue, at: number): ObjectHandle {
  if (typeof value !== "object") {
    throw new InterpreterError(
      `instruction ${at}: expected an object, got ${describe(value)}`,
    );
  }

  return value;
}

function asNumber(value: RuntimeValue, at: number): number {
  if (typeof value !== "number") {
    throw new InterpreterError(
      `instruction ${at}: expected a number, got ${describe(value)}`,
    );
  }

  return value;
}

function evalArith(op: ArithOp, left: number, right: number): number {
  switch (op) {
    case "add":
      return left + right;
    case "mul":
      return left * right;
    case "lshift":
      return left << right;
  }
}

/**
 * Execute a block and collect the values it escapes, in order.
 *
 * @param block – The block to run.
 * @param args – The values returned by `getarg`. Passing the same handle at
 * two indices makes those arguments alias.
 * @returns – The escaped values.
 */
export function interpret(
  block: BlockLike,
  args: readonly RuntimeValue[] = [],
): RuntimeValue[] {
  const heap = new Heap();
  const env = new Map<number, RuntimeValue>();
  const escaped: RuntimeValue[] = [];
  let allocations = 0;

  function get(value: Value, at: number): RuntimeValue {
    if (value.kind === "const") {
      return value.value;
    }

    const result = env.get(value.id);

    if (result === undefined) {
      throw new InterpreterError(
        `instruction ${at}: %${value.id} has no value`,
      );
    }

    return result;
  }

  for (const instr of block.instrs) {
    const at = instr.id;

    switch (instr.op) {
      case "alloc":
        env.set(at, objectHandle(`${instr.type}#${allocations}`));
        allocations++;
        break;
      case "getarg": {
        const arg = args[instr.index];

        if (arg === undefined) {
          throw new InterpreterError(
            `instruction ${at}: missing argument ${instr.index}`,
          );
        }

        env.set(at, arg);
        break;
      }
      case "load":
        env.set(
          at,
          heap.read(asObject(get(instr.object, at), at), instr.offset),
        );
        break;
      case "store":
        heap.write(
          asObject(get(instr.object, at), at),
          instr.offset,
          get(instr.value, at),
        );
        break;
      case "escape":
        escaped.push(get(instr.value, at));
        break;
      case "add":
      case "mul":
      case "lshift": {
        const [left, right] = instr.args;
        env.set(
          at,
          evalArith(
            instr.op,
            asNumber(get(left, at), at),
            asNumber(get(right, at), at),
          ),
        );
        break;
      }
      default:
        throw unknownOpcode(instr);
    }
  }

  return escaped;
}
