import { describe, it, expect } from "vitest";

import { Block } from "./block.js";
import { blockToString, opName } from "./print.js";

describe("blockToString", () => {
  it("numbers only instructions with a result", () => {
    const bb = new Block();
    const obj = bb.alloc();
    bb.store(obj, 8, "s");
    const v = bb.load(obj, 8);
    bb.escape(v);
    const shifted = bb.lshift(v, 2);
    bb.escape(shifted);

    expect(blockToString(bb)).toBe(
      [
        "var0 = alloc()",
        "store(var0, 8, s)",
        "var1 = load(var0, 8)",
        "escape(var1)",
        "var2 = lshift(var1, 2)",
        "escape(var2)",
      ].join("\n"),
    );
  });

  it("uses the given variable prefix", () => {
    const bb = new Block();
    const a = bb.getarg(3);
    bb.escape(bb.mul(a, a));

    expect(blockToString(bb, "v")).toBe(
      ["v0 = getarg(3)", "v1 = mul(v0, v0)", "escape(v1)"].join("\n"),
    );
  });

  it("renders an empty block as an empty string", () => {
    expect(blockToString(new Block())).toBe("");
  });
});

describe("opName", () => {
  it("names typed allocations after their type", () => {
    expect(opName({ op: "alloc", id: 0, type: "regexp" })).toBe("alloc_regexp");
    expect(opName({ op: "alloc", id: 0, type: "unknown" })).toBe("alloc");
    expect(opName({ op: "getarg", id: 0, index: 0 })).toBe("getarg");
  });
});
