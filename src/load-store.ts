import {
  type MemoryLocation,
  type TypeTable,
  mayAlias,
  objectTypeOf,
} from "./alias.js";
import { Block, type BlockLike } from "./block.js";
import {
  MalformedInstructionError,
  MalformedReferenceError,
  unknownOpcode,
} from "./errors.js";
import { type Value, sameValue, valueKey } from "./ir.js";

/**
 * What the pass knows is in one heap slot.
 */
interface HeapEntry {
  object: Value;
  offset: number;
  value: Value;
}

/**
 * The compile-time view of the heap, keyed by object and offset.
 */
type Heap = Map<string, HeapEntry>;

export interface LoadStoreReport {
  /** Indices, in the input block, of loads replaced by a known value. */
  forwardedLoads: number[];
  /** Indices, in the input block, of stores that were not emitted. */
  deadStores: number[];
}

export interface LoadStoreResult {
  block: Block;
  report: LoadStoreReport;
}

function heapKey(object: Value, offset: number): string {
  return `${valueKey(object)}@${offset}`;
}

/**
 * Run load forwarding, store-to-load forwarding and dead store elimination
 * over a block in a single forward pass, using the types of allocations to
 * keep heap facts alive across stores to objects of other types.
 *
 * @param block – The input block. It is not modified.
 * @returns – A new block, plus the input indices of the eliminated loads and
 * stores.
 */
export function optimizeLoadStoreWithReport(block: BlockLike): LoadStoreResult {
  const out = new Block();
  const report: LoadStoreReport = { forwardedLoads: [], deadStores: [] };

  // Maps each input instruction with a result to the value that stands for
  // it in the output block. Forwarded loads map to the value they were
  // replaced with.
  const renamed = new Map<number, Value>();
  const types: TypeTable = new Map();
  const heap: Heap = new Map();

  function resolve(at: number, value: Value): Value {
    if (value.kind !== "ref") {
      return value;
    }

    const resolved = renamed.get(value.id);

    if (resolved === undefined) {
      throw new MalformedReferenceError(at, `%${value.id}`);
    }

    return resolved;
  }

  function define(id: number, value: Value) {
    if (renamed.has(id)) {
      throw new MalformedInstructionError(
        `instruction ${id}: id already defined`,
      );
    }

    renamed.set(id, value);
  }

  function locationOf(object: Value, offset: number): MemoryLocation {
    return { object, offset, type: objectTypeOf(object, types) };
  }

  for (const instr of block.instrs) {
    switch (instr.op) {
      case "alloc": {
        const result = out.allocObject(instr.type);
        types.set(result.id, instr.type);
        define(instr.id, result);
        break;
      }
      case "getarg":
        define(instr.id, out.getarg(instr.index));
        break;
      case "load": {
        const object = resolve(instr.id, instr.object);
        const key = heapKey(object, instr.offset);
        const known = heap.get(key);

        // An exact hit on the same object and offset: reuse the value.
        if (known !== undefined) {
          define(instr.id, known.value);
          report.forwardedLoads.push(instr.id);
          break;
        }

        const result = out.load(object, instr.offset);
        heap.set(key, { object, offset: instr.offset, value: result });
        define(instr.id, result);
        break;
      }
      case "store": {
        const object = resolve(instr.id, instr.object);
        const value = resolve(instr.id, instr.value);
        const key = heapKey(object, instr.offset);

        // The slot already holds this value, so the store changes nothing.
        if (sameValue(heap.get(key)?.value, value)) {
          report.deadStores.push(instr.id);
          break;
        }

        // Forget everything this store could overwrite.
        const written = locationOf(object, instr.offset);
        for (const [entryKey, entry] of heap) {
          if (mayAlias(locationOf(entry.object, entry.offset), written)) {
            heap.delete(entryKey);
          }
        }

        out.store(object, instr.offset, value);
        heap.set(key, { object, offset: instr.offset, value });
        break;
      }
      case "escape":
        out.escape(resolve(instr.id, instr.value));
        break;
      case "add":
      case "mul":
      case "lshift": {
        const [left, right] = instr.args;
        define(
          instr.id,
          out.arith(
            instr.op,
            resolve(instr.id, left),
            resolve(instr.id, right),
          ),
        );
        break;
      }
      default:
        throw unknownOpcode(instr);
    }
  }

  return { block: out, report };
}

/**
 * Optimize the loads and stores of a block.
 *
 * @param block – The input block. It is not modified.
 * @returns – The optimized block.
 */
export function optimizeLoadStore(block: BlockLike): Block {
  return optimizeLoadStoreWithReport(block).block;
}
