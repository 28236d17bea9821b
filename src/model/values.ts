/**
 * Numeric helpers shared by every SP type.
 *
 * All of them fail soft: anything that cannot produce a number yields
 * `null`, and `null` inputs short-circuit to `null`. Formulas chain these
 * instead of checking each operand by hand.
 */

import type { FieldValue } from './types'

export const MISSING_VALUE_TEXT = 'N/A'

// ── Parsing ────────────────────────────────────────────────────

/** Plain decimal notation with an optional exponent; no hex, octal or binary. */
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

/**
 * Coerce a number or numeric string to a float.
 *
 *   ensureFloat(8)        → 8
 *   ensureFloat(' 2.5 ')  → 2.5
 *   ensureFloat('abc')    → null
 *   ensureFloat('0x10')   → null
 *   ensureFloat('')       → null
 */
export function ensureFloat(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value !== 'string') return null
  const text = value.trim()
  if (!DECIMAL_NUMBER.test(text)) return null
  const n = Number(text)
  return Number.isFinite(n) ? n : null
}

const LEADING_NUMBER = /^[+-]?\d*\.?\d*/

/**
 * Read the numeric prefix of a compound string, dropping whatever unit follows.
 *
 *   parseLeadingNumber('10 mM')     → 10
 *   parseLeadingNumber(' 7.5mg/mL') → 7.5
 *   parseLeadingNumber('mM')        → null
 */
export function parseLeadingNumber(value: unknown): number | null {
  if (typeof value === 'number') return ensureFloat(value)
  if (typeof value !== 'string') return null
  const match = LEADING_NUMBER.exec(value.trim())
  const token = match ? match[0] : ''
  if (!/\d/.test(token)) return null
  const n = Number(token)
  return Number.isFinite(n) ? n : null
}

// ── Arithmetic ─────────────────────────────────────────────────

/** Division that never throws and never returns Infinity. */
export function safeDiv(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null) return null
  if (denominator === 0) return null
  return numerator / denominator
}

export function safeMul(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null
  return a * b
}

export function safeSub(a: number | null, ...rest: (number | null)[]): number | null {
  if (a === null) return null
  let total = a
  for (const b of rest) {
    if (b === null) return null
    total -= b
  }
  return total
}

/** Sum of all operands, or null if any is missing. */
export function safeSum(...values: (number | null)[]): number | null {
  let total = 0
  for (const v of values) {
    if (v === null) return null
    total += v
  }
  return total
}

// ── Display ────────────────────────────────────────────────────

/**
 * Format a field value for display.
 *
 *   formatValue(4.23333)  → '4.233'
 *   formatValue(10)       → '10'
 *   formatValue(null)     → 'N/A'
 *   formatValue('DMSO')   → 'DMSO'
 */
export function formatValue(value: FieldValue | undefined, digits = 3): string {
  if (value === null || value === undefined) return MISSING_VALUE_TEXT
  if (typeof value === 'number') {
    const fixed = value.toFixed(digits)
    return fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed
  }
  return String(value)
}
