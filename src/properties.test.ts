import { isEqual } from "lodash-es";
import { describe, it, expect } from "vitest";

import { Block } from "./block.js";
import { type RuntimeValue, interpret, objectHandle } from "./interpret.js";
import type { InstrRef, ObjectType } from "./ir.js";
import {
  optimizeLoadStore,
  optimizeLoadStoreWithReport,
} from "./load-store.js";
import { blockToString } from "./print.js";

type ObjectKind = "array" | "hash" | "arg0" | "arg1";

type Step =
  | { kind: "load"; object: number; offset: number }
  | {
      kind: "store";
      object: number;
      offset: number;
      value: "const" | "loaded";
    };

const OBJECT_KINDS: ObjectKind[] = ["array", "hash", "arg0", "arg1"];
const OFFSETS = [0, 1];
const PROGRAM_LENGTH = 3;

const CONCRETE_TYPES: ObjectType[] = [
  "array",
  "hash",
  "string",
  "integer",
  "float",
  "symbol",
  "range",
  "regexp",
];

// Two distinct argument objects, and one object passed twice.
const ARG_CONFIGS: RuntimeValue[][] = [
  [objectHandle("p"), objectHandle("q")],
  [objectHandle("p"), objectHandle("p")],
];

function allSteps(): Step[] {
  const steps: Step[] = [];

  for (const object of [0, 1]) {
    for (const offset of OFFSETS) {
      steps.push({ kind: "load", object, offset });
      steps.push({ kind: "store", object, offset, value: "const" });
      steps.push({ kind: "store", object, offset, value: "loaded" });
    }
  }

  return steps;
}

function* programs(length: number): Generator<Step[]> {
  if (length === 0) {
    yield [];
    return;
  }

  for (const rest of programs(length - 1)) {
    for (const step of allSteps()) {
      yield [...rest, step];
    }
  }
}

function buildProgram(objects: ObjectKind[], program: Step[]): Block {
  const bb = new Block();
  const objs = objects.map((kind) => {
    switch (kind) {
      case "array":
        return bb.allocArray();
      case "hash":
        return bb.allocHash();
      case "arg0":
        return bb.getarg(0);
      case "arg1":
        return bb.getarg(1);
    }
  });
  const loaded: InstrRef[] = [];

  program.forEach((step, i) => {
    const obj = objs[step.object];

    if (step.kind === "load") {
      loaded.push(bb.load(obj, step.offset));
      return;
    }

    const last = loaded[loaded.length - 1];
    bb.store(
      obj,
      step.offset,
      step.value === "loaded" && last !== undefined ? last : 100 + i,
    );
  });

  for (const value of loaded) {
    bb.escape(value);
  }

  // Observe the final heap so that a wrongly dropped store shows up.
  for (const obj of objs) {
    for (const offset of OFFSETS) {
      bb.escape(bb.load(obj, offset));
    }
  }

  return bb;
}

function twoObjectBlock(
  first: (bb: Block) => InstrRef,
  second: (bb: Block) => InstrRef,
  loadOffset: number,
  storeOffset: number,
) {
  const bb = new Block();
  const a = first(bb);
  const b = second(bb);
  const v1 = bb.load(a, loadOffset);
  bb.store(b, storeOffset, 7);
  const v2 = bb.load(a, loadOffset);
  bb.escape(v1);
  bb.escape(v2);
  return bb;
}

describe.each(
  OBJECT_KINDS.flatMap((first) =>
    OBJECT_KINDS.map((second): [ObjectKind, ObjectKind] => [first, second]),
  ),
)("blocks over %s and %s", (first, second) => {
  it("produce the same escaped values after optimization", () => {
    for (const program of programs(PROGRAM_LENGTH)) {
      const block = buildProgram([first, second], program);
      const optimized = optimizeLoadStore(block);

      for (const args of ARG_CONFIGS) {
        const expected = interpret(block, args);
        const actual = interpret(optimized, args);

        if (!isEqual(expected, actual)) {
          expect.fail(
            `optimization changed escaped values for\n${blockToString(block)}`,
          );
        }
      }
    }
  });

  it("are not changed by optimizing twice", () => {
    for (const program of programs(PROGRAM_LENGTH)) {
      const once = optimizeLoadStore(buildProgram([first, second], program));
      const twice = optimizeLoadStoreWithReport(once);

      expect(twice.report).toEqual({ forwardedLoads: [], deadStores: [] });
      expect(blockToString(twice.block)).toBe(blockToString(once));
    }
  });
});

describe("type-based alias properties", () => {
  it("never invalidates a load on a store to an object of another type", () => {
    for (const typeA of CONCRETE_TYPES) {
      for (const typeB of CONCRETE_TYPES) {
        if (typeA === typeB) {
          continue;
        }

        for (const loadOffset of [0, 1, 2]) {
          for (const storeOffset of [0, 1, 2]) {
            const block = twoObjectBlock(
              (bb) => bb.allocObject(typeA),
              (bb) => bb.allocObject(typeB),
              loadOffset,
              storeOffset,
            );

            const { report } = optimizeLoadStoreWithReport(block);

            expect(report.forwardedLoads).toEqual([4]);
          }
        }
      }
    }
  });

  it("never invalidates a load on a store to another offset", () => {
    const objects: ((bb: Block) => InstrRef)[] = [
      (bb) => bb.alloc(),
      (bb) => bb.getarg(0),
      ...CONCRETE_TYPES.map((type) => (bb: Block) => bb.allocObject(type)),
    ];

    for (const makeObject of objects) {
      for (const [off1, off2] of [
        [0, 1],
        [1, 0],
        [0, -3],
      ]) {
        const bb = new Block();
        const obj = makeObject(bb);
        bb.load(obj, off1);
        bb.store(obj, off2, 7);
        bb.load(obj, off1);

        const { report } = optimizeLoadStoreWithReport(bb);

        expect(report.forwardedLoads).toEqual([3]);
      }
    }
  });

  it("invalidates a load on a store to an unknown or same-typed object", () => {
    const unknownObjects: ((bb: Block) => InstrRef)[] = [
      (bb) => bb.alloc(),
      (bb) => bb.getarg(0),
    ];
    const pairs: [(bb: Block) => InstrRef, (bb: Block) => InstrRef][] = [
      ...CONCRETE_TYPES.map(
        (type): [(bb: Block) => InstrRef, (bb: Block) => InstrRef] => [
          (bb) => bb.allocObject(type),
          (bb) => bb.allocObject(type),
        ],
      ),
      ...CONCRETE_TYPES.flatMap((type) =>
        unknownObjects.flatMap(
          (unknown): [(bb: Block) => InstrRef, (bb: Block) => InstrRef][] => [
            [(bb) => bb.allocObject(type), unknown],
            [unknown, (bb) => bb.allocObject(type)],
          ],
        ),
      ),
    ];

    for (const [first, second] of pairs) {
      const block = twoObjectBlock(first, second, 0, 0);
      const { block: optimized, report } = optimizeLoadStoreWithReport(block);

      expect(report.forwardedLoads).toEqual([]);
      expect(
        optimized.instrs.filter((instr) => instr.op === "load"),
      ).toHaveLength(2);
    }
  });
});
