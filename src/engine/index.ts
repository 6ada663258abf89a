export { match } from './matcher.js';
export {
  Translator,
  translate,
  translateDetailed,
  UNRECOGNIZED_MARKER,
  EMPTY_INSTRUCTION_MARKER,
} from './translator.js';
