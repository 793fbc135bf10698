export { extractField } from './extractor.js';

export {
  type ExtractionTemplate,
  TEMPLATE_FLAGS,
  compileTemplate,
  POLAR_RADIUS_TEMPLATE,
  BIRTH_DATE_TEMPLATE,
  POPULATION_TEMPLATE,
  ESTABLISHED_TEMPLATE,
  UNDERGRADUATES_TEMPLATE,
} from './templates.js';

export {
  LookupErrorCode,
  type LookupError,
  fieldNotFound,
  subjectNotFound,
  noFactBlock,
  fetchFailed,
} from './errors.js';
