import { Block, type BlockLike, type NewInstruction } from "./block.js";
import {
  MalformedInstructionError,
  MalformedReferenceError,
  UnknownOpcodeError,
  unknownOpcode,
} from "./errors.js";
import {
  ARITH_OPS,
  type ArithOp,
  type Instruction,
  type Literal,
  OBJECT_TYPES,
  type ObjectType,
  type Value,
  constant,
  hasResult,
} from "./ir.js";
import { opName } from "./print.js";

/**
 * An argument in the JSON form: a variable name, an integer constant, or an
 * explicit constant of either kind.
 */
export type JsonArg = string | number | { const: Literal };

export interface JsonInstruction {
  op: string;
  dest?: string;
  args?: JsonArg[];
  offset?: number;
  index?: number;
}

export interface JsonBlock {
  instrs: JsonInstruction[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArithOp(op: string): op is ArithOp {
  return ARITH_OPS.some((arith) => arith === op);
}

function allocType(op: string): ObjectType | undefined {
  if (op === "alloc") {
    return "unknown";
  }

  return OBJECT_TYPES.find(
    (type) => type !== "unknown" && op === `alloc_${type}`,
  );
}

/**
 * Build a block from its JSON form.
 *
 * @param json – The parsed JSON document.
 * @returns – The block, with every name resolved to the instruction that most
 * recently defined it.
 */
export function parseBlock(json: unknown): Block {
  if (!isRecord(json) || !Array.isArray(json.instrs)) {
    throw new MalformedInstructionError('expected an object with "instrs"');
  }

  const block = new Block();
  const names = new Map<string, Value>();

  json.instrs.forEach((raw: unknown, i) => {
    if (!isRecord(raw) || typeof raw.op !== "string") {
      throw new MalformedInstructionError(
        `instruction ${i}: expected an object with a string "op"`,
      );
    }

    const entry = raw;
    const op = raw.op;
    const rawArgs: unknown = entry.args ?? [];

    if (!Array.isArray(rawArgs)) {
      throw new MalformedInstructionError(
        `instruction ${i}: "args" must be an array`,
      );
    }

    const args = rawArgs.map((arg: unknown): Value => {
      if (typeof arg === "string") {
        const value = names.get(arg);

        if (value === undefined) {
          throw new MalformedReferenceError(i, arg);
        }

        return value;
      }

      if (typeof arg === "number") {
        return constant(arg);
      }

      if (
        isRecord(arg) &&
        (typeof arg.const === "number" || typeof arg.const === "string")
      ) {
        return constant(arg.const);
      }

      throw new MalformedInstructionError(
        `instruction ${i}: invalid argument ${JSON.stringify(arg)}`,
      );
    });

    function arity(count: number) {
      if (args.length !== count) {
        throw new MalformedInstructionError(
          `instruction ${i}: ${op} takes ${count} argument(s), got ${args.length}`,
        );
      }
    }

    function integerField(field: "offset" | "index"): number {
      const value = entry[field];

      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new MalformedInstructionError(
          `instruction ${i}: ${op} needs an integer "${field}"`,
        );
      }

      return value;
    }

    let instr: NewInstruction;
    const type = allocType(op);

    if (type !== undefined) {
      arity(0);
      instr = { op: "alloc", type };
    } else if (op === "getarg") {
      arity(0);
      instr = { op, index: integerField("index") };
    } else if (op === "load") {
      arity(1);
      instr = { op, object: args[0], offset: integerField("offset") };
    } else if (op === "store") {
      arity(2);
      instr = {
        op,
        object: args[0],
        offset: integerField("offset"),
        value: args[1],
      };
    } else if (op === "escape") {
      arity(1);
      instr = { op, value: args[0] };
    } else if (isArithOp(op)) {
      arity(2);
      instr = { op, args: [args[0], args[1]] };
    } else {
      throw new UnknownOpcodeError(op);
    }

    const result = block.append(instr);

    if (entry.dest !== undefined) {
      if (typeof entry.dest !== "string") {
        throw new MalformedInstructionError(
          `instruction ${i}: "dest" must be a string`,
        );
      }

      if (!hasResult(block.instrs[result.id])) {
        throw new MalformedInstructionError(
          `instruction ${i}: ${op} has no result to name`,
        );
      }

      names.set(entry.dest, result);
    }
  });

  return block;
}

/**
 * Write a block in its JSON form, naming results `varN` in the same
 * numbering as `blockToString`.
 */
export function serializeBlock(block: BlockLike): JsonBlock {
  const names = new Map<number, string>();

  function argToJson(arg: Value): JsonArg {
    if (arg.kind === "const") {
      return typeof arg.value === "number" ? arg.value : { const: arg.value };
    }

    return names.get(arg.id) ?? `%${arg.id}`;
  }

  const instrs = block.instrs.map((instr: Instruction): JsonInstruction => {
    const json = instrToJson(instr, argToJson);

    if (hasResult(instr)) {
      const dest = `var${names.size}`;
      names.set(instr.id, dest);

      return { ...json, dest };
    }

    return json;
  });

  return { instrs };
}

function instrToJson(
  instr: Instruction,
  argToJson: (arg: Value) => JsonArg,
): JsonInstruction {
  switch (instr.op) {
    case "alloc":
      return { op: opName(instr) };
    case "getarg":
      return { op: instr.op, index: instr.index };
    case "load":
      return {
        op: instr.op,
        args: [argToJson(instr.object)],
        offset: instr.offset,
      };
    case "store":
      return {
        op: instr.op,
        args: [argToJson(instr.object), argToJson(instr.value)],
        offset: instr.offset,
      };
    case "escape":
      return { op: instr.op, args: [argToJson(instr.value)] };
    case "add":
    case "mul":
    case "lshift":
      return { op: instr.op, args: instr.args.map(argToJson) };
    default:
      throw unknownOpcode(instr);
  }
}
