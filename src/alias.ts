import { type ObjectType, type Value, sameValue } from "./ir.js";

/**
 * One abstract heap slot: an object, a field offset within it, and the type
 * of the object as far as the analysis knows it.
 */
export interface MemoryLocation {
  object: Value;
  offset: number;
  type: ObjectType;
}

/**
 * Maps the ids of typed allocations to their object types.
 */
export type TypeTable = Map<number, ObjectType>;

/**
 * Look up the type of an object value.
 *
 * @param object – The value used as an object.
 * @param types – The types recorded for allocations seen so far.
 * @returns – The allocation's type, or "unknown" for constants, arguments,
 * loaded values and anything else that is not a typed allocation.
 */
export function objectTypeOf(object: Value, types: TypeTable): ObjectType {
  if (object.kind !== "ref") {
    return "unknown";
  }

  return types.get(object.id) ?? "unknown";
}

/**
 * Decide whether two heap slots may be the same storage.
 *
 * 1. The same object aliases itself only at the same offset.
 * 2. Different objects of two different concrete types never alias.
 * 3. Anything else (the same concrete type, or an unknown type on either
 *    side) may alias.
 */
export function mayAlias(a: MemoryLocation, b: MemoryLocation): boolean {
  if (sameValue(a.object, b.object)) {
    return a.offset === b.offset;
  }

  if (a.type !== "unknown" && b.type !== "unknown" && a.type !== b.type) {
    return false;
  }

  return true;
}
