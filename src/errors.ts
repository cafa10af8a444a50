/**
 * Base class for violations of block well-formedness.
 */
export class IrError extends Error {
  constructor(message?: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/**
 * An instruction refers to a value that is not defined earlier in the same
 * block, or to an instruction that has no result.
 */
export class MalformedReferenceError extends IrError {
  constructor(
    readonly instrIndex: number,
    readonly target: string,
    reason = "dangling reference",
  ) {
    super(`instruction ${instrIndex}: ${reason} (${target})`);
  }
}

/**
 * An instruction whose opcode is outside the closed instruction set.
 */
export class UnknownOpcodeError extends IrError {
  constructor(readonly opcode: string) {
    super(`unknown opcode: ${opcode}`);
  }
}

/**
 * An instruction with a known opcode but an invalid shape, such as a
 * non-integer offset.
 */
export class MalformedInstructionError extends IrError {}

/**
 * A runtime failure while interpreting a block.
 */
export class InterpreterError extends Error {
  constructor(message?: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = InterpreterError.name;
  }
}

/**
 * Build the error for an instruction that fell through an exhaustive switch
 * over opcodes.
 */
export function unknownOpcode(instr: never): UnknownOpcodeError {
  const value: unknown = instr;
  const op =
    typeof value === "object" && value !== null && "op" in value
      ? String(value.op)
      : String(value);

  return new UnknownOpcodeError(op);
}
