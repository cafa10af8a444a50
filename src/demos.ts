import { Block } from "./block.js";

export interface Demo {
  title: string;
  scenario: string;
  build: () => Block;
}

export const DEMOS: Demo[] = [
  {
    title: "Basic load elimination",
    scenario: "Two loads from the same location",
    build() {
      const bb = new Block();
      const obj = bb.getarg(0);
      const val1 = bb.load(obj, 0);
      const val2 = bb.load(obj, 0);
      bb.escape(val1);
      bb.escape(val2);
      return bb;
    },
  },
  {
    title: "Different types don't alias",
    scenario: "Load from an array, store to a hash, load from the array again",
    build() {
      const bb = new Block();
      const array = bb.allocArray();
      const hash = bb.allocHash();
      const val1 = bb.load(array, 0);
      bb.store(hash, 0, 42);
      const val2 = bb.load(array, 0);
      bb.escape(val1);
      bb.escape(val2);
      return bb;
    },
  },
  {
    title: "Same type is conservative",
    scenario: "Load from array1, store to array2, load from array1 again",
    build() {
      const bb = new Block();
      const array1 = bb.allocArray();
      const array2 = bb.allocArray();
      const val1 = bb.load(array1, 0);
      bb.store(array2, 0, 42);
      const val2 = bb.load(array1, 0);
      bb.escape(val1);
      bb.escape(val2);
      return bb;
    },
  },
  {
    title: "Multiple object types",
    scenario: "Stores to a hash, a string and a symbol between two array loads",
    build() {
      const bb = new Block();
      const array = bb.allocArray();
      const hash = bb.allocHash();
      const string = bb.allocString();
      const symbol = bb.allocSymbol();
      bb.load(array, 0);
      bb.store(hash, 0, 1);
      bb.store(string, 0, 2);
      bb.store(symbol, 0, 3);
      const val = bb.load(array, 0);
      bb.escape(val);
      return bb;
    },
  },
  {
    title: "Store-to-load forwarding",
    scenario: "Store to a string and an integer, then load both",
    build() {
      const bb = new Block();
      const string = bb.allocString();
      const integer = bb.allocInteger();
      bb.store(string, 0, "hello");
      bb.store(integer, 0, 42);
      const strVal = bb.load(string, 0);
      const intVal = bb.load(integer, 0);
      bb.escape(strVal);
      bb.escape(intVal);
      return bb;
    },
  },
  {
    title: "Different offsets don't alias",
    scenario: "Load offset 0, store offset 4, load offset 0 again",
    build() {
      const bb = new Block();
      const obj = bb.allocHash();
      const val1 = bb.load(obj, 0);
      bb.store(obj, 4, 99);
      const val2 = bb.load(obj, 0);
      bb.escape(val1);
      bb.escape(val2);
      return bb;
    },
  },
];
