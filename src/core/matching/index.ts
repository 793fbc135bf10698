export {
  tokenize,
  normalizeForMatching,
  stripQuestionMarks,
  prepareQuestion,
  clean,
} from './tokenizer.js';

export {
  WILDCARD,
  type Pattern,
  isWildcard,
  countWildcards,
  match,
} from './matcher.js';
