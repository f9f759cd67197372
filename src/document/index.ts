/**
 * Document Module Index
 */

export { countWords, toPlainText, WordCounter } from './word-counter';
export {
  splitSections,
  countSections,
  findSection,
  normalizeLocation,
  replaceSection,
  type Section,
} from './sections';
