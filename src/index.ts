export type {
  FieldDataType,
  FieldSource,
  FieldGroup,
  FieldDescriptor,
  FieldValue,
  RequestRecord,
  NormalizedRequest,
  OperatorInputs,
  CalculateOptions,
} from './model/types'
export { FIELD_GROUPS, FIELD_GROUP_TITLES } from './model/types'
export {
  SetupParamError,
  UnknownFieldError,
  CatalogError,
  UnsupportedSetupParamTypeError,
} from './model/errors'
export {
  ensureFloat,
  parseLeadingNumber,
  safeDiv,
  formatValue,
  MISSING_VALUE_TEXT,
} from './model/values'
export { parseOperatorInputs, operatorFieldSchema } from './model/schemas'
export type { OperatorInputIssue, ParsedOperatorInputs } from './model/schemas'
export { FieldRegistry, defineField } from './rules/fieldRegistry'
export { normalizeRequest } from './rules/normalize'
export { evaluate, validateFormulas } from './rules/engine'
export type { Formula, FormulaScope, FormulaTable } from './rules/engine'
export { CalculationResult } from './rules/result'
export { explainField, explainLine, formatExplanation } from './rules/explain'
export type { FieldExplanation, DependencyExplanation } from './rules/explain'
export {
  resolveSetupParamType,
  lookupSetupParamType,
  listSetupParamTypes,
  getSupportedSetupParamTypes,
} from './rules/spTypes'
export type { SetupParamModule, SetupParamLookup } from './rules/spTypes'
export { dar8Module } from './rules/dar8/module'
export { dar8Registry } from './rules/dar8/fields'
export type { Dar8FieldKey } from './rules/dar8/fields'
export { calculateDar8, normalizeDar8Request } from './rules/dar8/calculate'
export { coerceRequestValues, orderedRequestItems, REQUEST_FIELDS } from './request/schema'
export { renderFieldDocMarkdown } from './docs/fieldDoc'
export { SetupParamService } from './service/SetupParamService'
export type { ComputedEvent, SetupParamStatus } from './service/SetupParamService'
export { Logger, logger } from './utils/logger'
export type { LogLevel, LogEntry, LoggerLike } from './utils/logger'
