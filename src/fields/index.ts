/**
 * Fields, questions and response decoding.
 *
 * @packageDocumentation
 */

export * from './types.js';
export { renderFieldSchema, fieldValidators, validateFieldValue, isOptionalField } from './field.js';
export { visibleOptions, isMultiSelect, isOptionalSelect, type VisibleOption } from './select.js';
export { isCalendarDate } from './date.js';
export { runValidators } from './validators.js';
export {
  renderQuestion,
  questionProvides,
  fieldName,
  type Question,
  type QuestionField,
  type QuestionTemplate,
} from './question.js';
export { applyResponses, checkResponseSchema } from './responses.js';
