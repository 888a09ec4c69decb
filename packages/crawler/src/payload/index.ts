export { extractBlob, parseBlob, type BlobAnchor } from "./blob.js";
export {
  resolvePath,
  expectArray,
  expectRecord,
  findInArray,
  isRecord,
  type PathSegment,
} from "./nested.js";
export { FlatPayload, MAX_HOPS } from "./flat-array.js";
