/**
 * Calculation Engine
 *
 * Generic evaluator shared by every SP type. Walks the registry in
 * dependency order and, per field, either runs its formula or carries the
 * value from the normalized request / operator inputs. A formula sees only
 * the fields it declares in `dependsOn`, so the explanation of a field is
 * always the complete list of what produced it.
 */

import type {
  CalculateOptions,
  FieldDescriptor,
  FieldValue,
  NormalizedRequest,
  OperatorInputs,
} from '../model/types'
import { CatalogError } from '../model/errors'
import { ensureFloat } from '../model/values'
import type { FieldRegistry } from './fieldRegistry'
import { CalculationResult } from './result'

// ── Types ────────────────────────────────────────────────────────

/** Read access to the declared dependencies of the field being computed. */
export interface FormulaScope {
  value(key: string): FieldValue
  /** Numeric dependency, or null when it holds no number */
  number(key: string): number | null
  /** Text dependency; null reads as '' */
  text(key: string): string
  /** Calculation date (the only input not listed in the catalog) */
  now(): Date
}

export type Formula = (scope: FormulaScope) => FieldValue

export type FormulaTable<K extends string> = Partial<Record<K, Formula>>

// ── Validation ───────────────────────────────────────────────────

/**
 * Every derived or fixed field needs a formula, except request-only
 * derivations, which the normalizer extracts. Formulas must not name
 * fields outside the catalog.
 */
export function validateFormulas<K extends string>(
  registry: FieldRegistry<K>,
  formulas: FormulaTable<K>,
): void {
  const problems: string[] = []

  for (const key of Object.keys(formulas)) {
    if (!registry.has(key)) problems.push(`formula for unknown key "${key}"`)
  }

  for (const field of registry.all()) {
    const hasFormula = formulas[field.key] !== undefined
    if (field.source === 'request' || field.source === 'userInput') {
      if (hasFormula) problems.push(`input field "${field.key}" must not have a formula`)
      continue
    }
    if (hasFormula) continue
    const requestOnly =
      field.source === 'derived' &&
      field.dependsOn.length > 0 &&
      field.dependsOn.every(dep => registry.describe(dep).source === 'request')
    if (!requestOnly) problems.push(`no formula for ${field.source} field "${field.key}"`)
  }

  if (problems.length > 0) throw new CatalogError(registry.name, problems)
}

// ── Operator input coercion ──────────────────────────────────────

export function coerceOperatorValue(field: FieldDescriptor, raw: unknown): FieldValue {
  switch (field.dataType) {
    case 'float':
    case 'optionalFloat':
      return ensureFloat(raw) ?? field.defaultValue ?? null
    case 'bool':
      return typeof raw === 'boolean' ? raw : null
    case 'enum': {
      const text = typeof raw === 'string' ? raw.trim() : ''
      if (!field.enumValues) return text
      return field.enumValues.includes(text) ? text : ''
    }
    case 'string':
      return raw === null || raw === undefined ? '' : String(raw).trim()
  }
}

// ── evaluate ─────────────────────────────────────────────────────

function scopeFor(
  field: FieldDescriptor,
  values: ReadonlyMap<string, FieldValue>,
  now: () => Date,
): FormulaScope {
  const read = (key: string): FieldValue => {
    if (!field.dependsOn.includes(key)) {
      throw new Error(`Formula for "${field.key}" reads undeclared dependency "${key}"`)
    }
    return values.get(key) ?? null
  }
  return {
    value: read,
    number(key) {
      const v = read(key)
      return typeof v === 'number' ? v : null
    },
    text(key) {
      const v = read(key)
      return v === null ? '' : String(v)
    },
    now,
  }
}

/**
 * Compute every field of the catalog.
 *
 * Missing request values and omitted optional operator inputs become
 * `null` and flow through the formulas; nothing here throws on bad data.
 */
export function evaluate<K extends string>(
  registry: FieldRegistry<K>,
  formulas: FormulaTable<K>,
  request: NormalizedRequest,
  operator: OperatorInputs,
  options: CalculateOptions = {},
): CalculationResult<K> {
  const now = options.now ?? (() => new Date())
  const values = new Map<string, FieldValue>()

  for (const key of registry.evaluationOrder()) {
    const field = registry.describe(key)
    const formula = formulas[key]

    let value: FieldValue
    if (formula) {
      value = formula(scopeFor(field, values, now))
    } else if (field.source === 'userInput') {
      value = coerceOperatorValue(field, operator[key])
    } else {
      value = request[key] ?? null
    }
    values.set(key, value)
  }

  return new CalculationResult(registry, values)
}
