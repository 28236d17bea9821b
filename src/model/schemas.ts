/**
 * Zod runtime validation for operator inputs.
 *
 * Schemas are derived from the catalog's userInput descriptors, so a new
 * SP type gets validation without writing one. The engine itself accepts
 * anything and fails soft; this is the boundary check for values typed
 * into a form or loaded from a saved session.
 *
 * Conventions:
 *  - Numbers may arrive as numbers or numeric strings, and must be non-negative.
 *  - '' / null / undefined mean "not entered".
 *  - Enum inputs must be one of the descriptor's enumValues.
 */

import { z } from 'zod'
import type { FieldDescriptor, OperatorInputs } from './types'
import { ensureFloat } from './values'
import type { FieldRegistry } from '../rules/fieldRegistry'

// ── Reusable validators ──────────────────────────────────────────

const numericText = z
  .string()
  .trim()
  .refine(s => s === '' || ensureFloat(s) !== null, 'Expected a number')
  .refine(s => s === '' || (ensureFloat(s) ?? 0) >= 0, 'Must be non-negative')

const nonNegativeNumber = z.number().finite().min(0, 'Must be non-negative')

// ── Per-field schema ─────────────────────────────────────────────

export function operatorFieldSchema(field: FieldDescriptor): z.ZodTypeAny {
  switch (field.dataType) {
    case 'float':
    case 'optionalFloat':
      return z.union([nonNegativeNumber, numericText]).nullish()
    case 'bool':
      return z.boolean().nullish()
    case 'enum': {
      const values = field.enumValues ?? []
      return z
        .string()
        .trim()
        .refine(s => s === '' || values.includes(s), `Expected one of: ${values.join(', ')}`)
        .nullish()
    }
    case 'string':
      return z.string().nullish()
  }
}

export interface OperatorInputIssue {
  key: string
  message: string
}

export interface ParsedOperatorInputs {
  inputs: OperatorInputs
  issues: OperatorInputIssue[]
}

/**
 * Keep the valid operator fields, report the rest.
 * Keys that are not userInput fields of the catalog are reported too.
 */
export function parseOperatorInputs(
  registry: FieldRegistry,
  raw: Readonly<Record<string, unknown>>,
): ParsedOperatorInputs {
  const inputs: Record<string, unknown> = {}
  const issues: OperatorInputIssue[] = []

  for (const [key, value] of Object.entries(raw)) {
    if (!registry.has(key) || registry.describe(key).source !== 'userInput') {
      issues.push({ key, message: 'Not an operator input' })
      continue
    }
    const parsed = operatorFieldSchema(registry.describe(key)).safeParse(value)
    if (parsed.success) {
      inputs[key] = parsed.data
    } else {
      issues.push({ key, message: parsed.error.issues.map(i => i.message).join('; ') })
    }
  }

  return { inputs, issues }
}
