export {
  type DocumentProvider,
  type CapturedArgs,
  type Action,
  type LookupRule,
  type ExitRule,
  type Rule,
  type DispatchResult,
  type DispatchKind,
  NO_MATCH_ANSWER,
  NO_ANSWERS_ANSWER,
} from './types.js';

export { FactLookupAction, subjectFromArgs, type AnswerPhrase } from './actions.js';

export {
  RuleRegistry,
  DEFAULT_LOOKUPS,
  type LookupSpec,
  EXIT_KEYWORD,
  createDefaultRegistry,
} from './registry.js';

export { Dispatcher, answersOf } from './dispatcher.js';
