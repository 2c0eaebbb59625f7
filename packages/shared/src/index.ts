export * from './constants/index.js';
export * from './schemas/validation/pathology.validation.js';
export {
  canonicalizeHeader,
  foldCase,
  containsIgnoreCase,
  cellText,
} from './utils/text.utils.js';
