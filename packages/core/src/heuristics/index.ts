export {
  getArrayItemKinds,
  isHomogeneousArray,
  type ArrayItemKind,
} from './array-kinds.js';
export {
  detectStringFormat,
  detectStringPattern,
  DIGIT_GROUP_PATTERN,
} from './string-format.js';
