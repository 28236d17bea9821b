import { describe, it, expect } from 'vitest'
import {
  ensureFloat,
  parseLeadingNumber,
  safeDiv,
  safeMul,
  safeSub,
  safeSum,
  formatValue,
  MISSING_VALUE_TEXT,
} from '../../src/model/values'

// ── ensureFloat ──────────────────────────────────────────────────

describe('ensureFloat', () => {
  it('accepts numbers and numeric strings', () => {
    expect(ensureFloat(8)).toBe(8)
    expect(ensureFloat(2.5)).toBe(2.5)
    expect(ensureFloat(' 2.5 ')).toBe(2.5)
    expect(ensureFloat('150000')).toBe(150000)
    expect(ensureFloat('-3')).toBe(-3)
    expect(ensureFloat('1.5e3')).toBe(1500)
    expect(ensureFloat('.5')).toBe(0.5)
    expect(ensureFloat('7.')).toBe(7)
  })

  it('rejects hex, octal and binary literals', () => {
    expect(ensureFloat('0x10')).toBeNull()
    expect(ensureFloat('0o17')).toBeNull()
    expect(ensureFloat('0b101')).toBeNull()
    expect(ensureFloat('Infinity')).toBeNull()
  })

  it('returns null for anything unparseable instead of throwing', () => {
    expect(ensureFloat('abc')).toBeNull()
    expect(ensureFloat('')).toBeNull()
    expect(ensureFloat('   ')).toBeNull()
    expect(ensureFloat('10 mM')).toBeNull()
    expect(ensureFloat(null)).toBeNull()
    expect(ensureFloat(undefined)).toBeNull()
    expect(ensureFloat(true)).toBeNull()
    expect(ensureFloat({})).toBeNull()
    expect(ensureFloat(Number.NaN)).toBeNull()
    expect(ensureFloat(Number.POSITIVE_INFINITY)).toBeNull()
  })
})

// ── parseLeadingNumber ───────────────────────────────────────────

describe('parseLeadingNumber', () => {
  it('reads the number in front of a unit', () => {
    expect(parseLeadingNumber('10 mM')).toBe(10)
    expect(parseLeadingNumber('7.5mg/mL')).toBe(7.5)
    expect(parseLeadingNumber('  8.5 mg/mL')).toBe(8.5)
    expect(parseLeadingNumber('-2mM')).toBe(-2)
    expect(parseLeadingNumber('.5 mM')).toBe(0.5)
  })

  it('stops at the second decimal point', () => {
    expect(parseLeadingNumber('1.2.3')).toBe(1.2)
  })

  it('returns null when there is no leading digit', () => {
    expect(parseLeadingNumber('mM')).toBeNull()
    expect(parseLeadingNumber('N/A')).toBeNull()
    expect(parseLeadingNumber('-')).toBeNull()
    expect(parseLeadingNumber('.')).toBeNull()
    expect(parseLeadingNumber('')).toBeNull()
    expect(parseLeadingNumber(null)).toBeNull()
  })

  it('passes numbers through', () => {
    expect(parseLeadingNumber(12)).toBe(12)
  })
})

// ── Arithmetic ───────────────────────────────────────────────────

describe('safeDiv', () => {
  it('divides', () => {
    expect(safeDiv(100, 20)).toBe(5)
  })

  it('returns null for a zero or missing denominator, never Infinity', () => {
    expect(safeDiv(100, 0)).toBeNull()
    expect(safeDiv(0, 0)).toBeNull()
    expect(safeDiv(100, null)).toBeNull()
    expect(safeDiv(null, 5)).toBeNull()
  })
})

describe('null-propagating helpers', () => {
  it('safeMul', () => {
    expect(safeMul(2, 3)).toBe(6)
    expect(safeMul(null, 3)).toBeNull()
  })

  it('safeSub subtracts every operand', () => {
    expect(safeSub(10, 5, 1)).toBe(4)
    expect(safeSub(10, 5, null)).toBeNull()
    expect(safeSub(null, 1)).toBeNull()
  })

  it('safeSum', () => {
    expect(safeSum(1, 2, 3)).toBe(6)
    expect(safeSum()).toBe(0)
    expect(safeSum(1, null)).toBeNull()
  })
})

// ── formatValue ──────────────────────────────────────────────────

describe('formatValue', () => {
  it('rounds numbers to 3 decimals and trims trailing zeros', () => {
    expect(formatValue(4.233333)).toBe('4.233')
    expect(formatValue(0.099)).toBe('0.099')
    expect(formatValue(10)).toBe('10')
    expect(formatValue(150000)).toBe('150000')
    expect(formatValue(12.5)).toBe('12.5')
    expect(formatValue(2 / 3)).toBe('0.667')
  })

  it('honours a custom precision', () => {
    expect(formatValue(2 / 3, 1)).toBe('0.7')
    expect(formatValue(5, 0)).toBe('5')
  })

  it('renders missing values as N/A', () => {
    expect(formatValue(null)).toBe(MISSING_VALUE_TEXT)
    expect(formatValue(undefined)).toBe('N/A')
  })

  it('renders other types by their string form', () => {
    expect(formatValue('DMSO')).toBe('DMSO')
    expect(formatValue('')).toBe('')
    expect(formatValue(true)).toBe('true')
  })
})
