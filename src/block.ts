import {
  MalformedInstructionError,
  MalformedReferenceError,
} from "./errors.js";
import {
  type ArithOp,
  type Instruction,
  type InstrRef,
  type Literal,
  type ObjectType,
  type Value,
  constant,
  hasResult,
  operands,
  ref,
} from "./ir.js";

/**
 * An operand as accepted by the construction API. Plain literals are wrapped
 * as constants.
 */
export type Operand = Value | Literal;

/**
 * Instructions that are appended to a block, before the block assigns them
 * their index.
 */
type Unnumbered<T> = T extends Instruction ? Omit<T, "id"> : never;

export type NewInstruction = Unnumbered<Instruction>;

/**
 * Anything that exposes an ordered instruction list. Passes read blocks
 * through this view so they never depend on the construction API.
 */
export interface BlockLike {
  readonly instrs: readonly Instruction[];
}

function wrapOperand(operand: Operand): Value {
  return typeof operand === "object" ? operand : constant(operand);
}

/**
 * A straight-line sequence of instructions. Each instruction's index is its
 * identity and is never reused.
 */
export class Block implements BlockLike {
  private readonly _instrs: Instruction[] = [];

  get instrs(): readonly Instruction[] {
    return this._instrs;
  }

  get length(): number {
    return this._instrs.length;
  }

  /**
   * Append an instruction, checking that every reference it makes points at
   * an earlier result-bearing instruction.
   */
  append(instr: NewInstruction): InstrRef {
    const id = this._instrs.length;
    const numbered: Instruction = { ...instr, id };

    if (numbered.op === "load" || numbered.op === "store") {
      if (!Number.isInteger(numbered.offset)) {
        throw new MalformedInstructionError(
          `instruction ${id}: offset must be an integer, got ${numbered.offset}`,
        );
      }
    }

    if (numbered.op === "getarg" && !Number.isInteger(numbered.index)) {
      throw new MalformedInstructionError(
        `instruction ${id}: argument index must be an integer, got ${numbered.index}`,
      );
    }

    for (const operand of operands(numbered)) {
      this.checkReference(id, operand);
    }

    this._instrs.push(numbered);

    return ref(id);
  }

  allocObject(type: ObjectType): InstrRef {
    return this.append({ op: "alloc", type });
  }

  alloc(): InstrRef {
    return this.allocObject("unknown");
  }

  allocArray(): InstrRef {
    return this.allocObject("array");
  }

  allocHash(): InstrRef {
    return this.allocObject("hash");
  }

  allocString(): InstrRef {
    return this.allocObject("string");
  }

  allocInteger(): InstrRef {
    return this.allocObject("integer");
  }

  allocFloat(): InstrRef {
    return this.allocObject("float");
  }

  allocSymbol(): InstrRef {
    return this.allocObject("symbol");
  }

  allocRange(): InstrRef {
    return this.allocObject("range");
  }

  allocRegexp(): InstrRef {
    return this.allocObject("regexp");
  }

  getarg(index: number): InstrRef {
    return this.append({ op: "getarg", index });
  }

  load(object: Operand, offset: number): InstrRef {
    return this.append({ op: "load", object: wrapOperand(object), offset });
  }

  store(object: Operand, offset: number, value: Operand): void {
    this.append({
      op: "store",
      object: wrapOperand(object),
      offset,
      value: wrapOperand(value),
    });
  }

  escape(value: Operand): void {
    this.append({ op: "escape", value: wrapOperand(value) });
  }

  arith(op: ArithOp, left: Operand, right: Operand): InstrRef {
    return this.append({
      op,
      args: [wrapOperand(left), wrapOperand(right)],
    });
  }

  add(left: Operand, right: Operand): InstrRef {
    return this.arith("add", left, right);
  }

  mul(left: Operand, right: Operand): InstrRef {
    return this.arith("mul", left, right);
  }

  lshift(left: Operand, right: Operand): InstrRef {
    return this.arith("lshift", left, right);
  }

  private checkReference(at: number, operand: Value) {
    if (operand.kind !== "ref") {
      return;
    }

    const target = this._instrs[operand.id];

    if (target === undefined) {
      throw new MalformedReferenceError(at, `%${operand.id}`);
    }

    if (!hasResult(target)) {
      throw new MalformedReferenceError(
        at,
        `%${operand.id}`,
        `${target.op} has no result`,
      );
    }
  }
}
