import { isEqual } from "lodash-es";

import type { Block } from "./block.js";

export type BlockPass = (block: Block) => Block;

/**
 * Run a pass on a block until a fixpoint is reached.
 *
 * @param pass – The pass to apply.
 * @returns – A pass that applies `pass` until its output stops changing.
 */
export function toFixpoint(pass: BlockPass): BlockPass {
  return function applyPass(block: Block) {
    let current = block;
    let prev: Block | undefined;

    while (prev === undefined || !isEqual(current.instrs, prev.instrs)) {
      prev = current;
      current = pass(current);
    }

    return current;
  };
}
