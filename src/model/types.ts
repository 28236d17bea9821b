/**
 * Setup-parameter data model.
 *
 * A catalog is a flat, ordered list of FieldDescriptors. Descriptors carry
 * metadata only: what a field is, where its value comes from, and which
 * other fields its formula reads. Formulas live next to each SP type's
 * calculation module.
 */

// ── Field metadata ───────────────────────────────────────────────

export type FieldDataType = 'float' | 'optionalFloat' | 'string' | 'enum' | 'bool'

/** Provenance tag. Not a computation rule. */
export type FieldSource = 'request' | 'userInput' | 'derived' | 'fixed'

export type FieldGroup =
  | 'inputRequest'
  | 'inputUser'
  | 'outputReduction'
  | 'outputConjugation'
  | 'meta'

/** Display order of groups in tables and generated docs. */
export const FIELD_GROUPS: readonly FieldGroup[] = [
  'inputRequest',
  'inputUser',
  'outputReduction',
  'outputConjugation',
  'meta',
]

export const FIELD_GROUP_TITLES: Record<FieldGroup, string> = {
  inputRequest: 'Request inputs',
  inputUser: 'Operator inputs',
  outputReduction: 'Antibody reduction set-up',
  outputConjugation: 'Antibody conjugation set-up',
  meta: 'Metadata',
}

export interface FieldDescriptor<K extends string = string> {
  readonly key: K
  readonly displayName: string
  readonly unit: string
  readonly dataType: FieldDataType
  readonly source: FieldSource
  readonly group: FieldGroup
  readonly dependsOn: readonly string[]
  readonly formulaText: string
  readonly description: string
  /** Operators should check this value before pipetting */
  readonly isImportant: boolean
  /** External request attribute (source = 'request' only) */
  readonly requestKey?: string
  /** Used when the operator leaves a required user input empty */
  readonly defaultValue?: number
  readonly enumValues?: readonly string[]
}

// ── Values ───────────────────────────────────────────────────────

/** `null` means "no value": absent input, unparseable text, or a failed division. */
export type FieldValue = number | string | boolean | null

/** Upstream request as imported from the task template, keyed by external names. */
export type RequestRecord = Readonly<Record<string, unknown>>

/** Request fields after normalization, keyed by internal field keys. */
export type NormalizedRequest = Readonly<Record<string, FieldValue>>

/** Values entered by the operator, keyed by internal field keys. */
export type OperatorInputs = Readonly<Record<string, unknown>>

export interface CalculateOptions {
  /** Wall-clock seam for fields that embed the current date */
  now?: () => Date
}
