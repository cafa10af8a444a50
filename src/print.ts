import type { BlockLike } from "./block.js";
import { unknownOpcode } from "./errors.js";
import { type Instruction, type Value, hasResult } from "./ir.js";

/**
 * The name an instruction is printed under, e.g. `alloc_array` or `load`.
 */
export function opName(instr: Instruction): string {
  if (instr.op === "alloc") {
    return instr.type === "unknown" ? "alloc" : `alloc_${instr.type}`;
  }

  return instr.op;
}

/**
 * Render a block as one instruction per line. Instructions with a result are
 * printed as `varN = op(args)`, numbering only those instructions; stores and
 * escapes are printed without a result variable.
 *
 * @param block – The block to print.
 * @param varPrefix – The prefix of result variable names.
 * @returns – The listing, lines joined by newlines.
 */
export function blockToString(block: BlockLike, varPrefix = "var"): string {
  const names = new Map<number, string>();

  function argToString(arg: Value): string {
    if (arg.kind === "const") {
      return String(arg.value);
    }

    return names.get(arg.id) ?? `%${arg.id}`;
  }

  return block.instrs
    .map((instr) => {
      const args = instrArgs(instr).map((arg) =>
        typeof arg === "number" ? String(arg) : argToString(arg),
      );
      const call = `${opName(instr)}(${args.join(", ")})`;

      if (!hasResult(instr)) {
        return call;
      }

      const name = `${varPrefix}${names.size}`;
      names.set(instr.id, name);

      return `${name} = ${call}`;
    })
    .join("\n");
}

function instrArgs(instr: Instruction): (Value | number)[] {
  switch (instr.op) {
    case "alloc":
      return [];
    case "getarg":
      return [instr.index];
    case "load":
      return [instr.object, instr.offset];
    case "store":
      return [instr.object, instr.offset, instr.value];
    case "escape":
      return [instr.value];
    case "add":
    case "mul":
    case "lshift":
      return [...instr.args];
    default:
      throw unknownOpcode(instr);
  }
}
