export { PatchSet, comparePatchSets } from "./PatchSet.js";
export { reclassify, findEpoch } from "./reclassify.js";
