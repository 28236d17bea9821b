/**
 * Explanation Renderer
 *
 * Describes one field of a CalculationResult: its value, provenance,
 * formula, and the current values of the fields it reads directly.
 * Dependencies are listed one level deep; select a dependency to
 * explain it in turn.
 */

import type { FieldSource, FieldValue } from '../model/types'
import type { CalculationResult } from './result'

// ── Types ────────────────────────────────────────────────────────

export interface DependencyExplanation {
  key: string
  displayName: string
  unit: string
  value: FieldValue
  formatted: string
}

export interface FieldExplanation {
  key: string
  displayName: string
  unit: string
  value: FieldValue
  formatted: string
  source: FieldSource
  description: string
  formulaText: string
  dependencies: DependencyExplanation[]
}

export const NO_DEPENDENCIES_TEXT = 'none (raw input or fixed constant)'

// ── explainField ─────────────────────────────────────────────────

/** Throws UnknownFieldError when the key is not in the result's catalog. */
export function explainField(result: CalculationResult, key: string): FieldExplanation {
  const field = result.descriptor(key)
  return {
    key: field.key,
    displayName: field.displayName,
    unit: field.unit,
    value: result.get(key),
    formatted: result.format(key),
    source: field.source,
    description: field.description,
    formulaText: field.formulaText,
    dependencies: field.dependsOn.map(dep => {
      const d = result.descriptor(dep)
      return {
        key: dep,
        displayName: d.displayName,
        unit: d.unit,
        value: result.get(dep),
        formatted: result.format(dep),
      }
    }),
  }
}

// ── explainLine ──────────────────────────────────────────────────

function withUnit(name: string, unit: string): string {
  return unit ? `${name} [${unit}]` : name
}

export function formatExplanation(explanation: FieldExplanation): string {
  const lines = [
    withUnit(explanation.displayName, explanation.unit),
    `Value: ${explanation.formatted}`,
    `Source: ${explanation.source}`,
  ]
  if (explanation.description) lines.push(`Description: ${explanation.description}`)
  if (explanation.formulaText) lines.push(`Formula: ${explanation.formulaText}`)

  if (explanation.dependencies.length === 0) {
    lines.push(`Depends on: ${NO_DEPENDENCIES_TEXT}`)
  } else {
    lines.push('Depends on:')
    for (const dep of explanation.dependencies) {
      lines.push(`  |- ${withUnit(dep.displayName, dep.unit)}: ${dep.formatted}`)
    }
  }
  return lines.join('\n')
}

export function explainLine(result: CalculationResult, key: string): string {
  return formatExplanation(explainField(result, key))
}
