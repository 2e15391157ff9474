import { classifyValue, type JsonArray, type JsonKind } from '../types/json.js';

/** Kind tag of an array element; holes and non-JSON values are `unsupported` */
export type ArrayItemKind = JsonKind | 'unsupported';

/**
 * Set of top-level kind tags present in an array. Integers and floats share
 * the `number` tag; objects are not compared by shape.
 */
export function getArrayItemKinds(arr: JsonArray): Set<ArrayItemKind> {
  const kinds = new Set<ArrayItemKind>();
  // Indexed so that holes in sparse arrays are seen as undefined
  for (let i = 0; i < arr.length; i++) {
    kinds.add(classifyValue(arr[i]).kind);
  }
  return kinds;
}

/**
 * True when every element shares one JSON kind tag (vacuously true when
 * empty). An unsupported element never makes an array homogeneous.
 */
export function isHomogeneousArray(arr: JsonArray): boolean {
  const kinds = getArrayItemKinds(arr);
  return kinds.size <= 1 && !kinds.has('unsupported');
}
