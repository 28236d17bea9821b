/**
 * Tests for the generic calculation engine.
 *
 * 1. Formula table validation
 * 2. Evaluation: carries, formulas, dependency scoping
 * 3. Operator input coercion
 */

import { describe, it, expect } from 'vitest'
import { defineField, FieldRegistry } from '../../src/rules/fieldRegistry'
import { evaluate, validateFormulas, coerceOperatorValue } from '../../src/rules/engine'
import type { FormulaTable } from '../../src/rules/engine'
import { CatalogError } from '../../src/model/errors'
import { safeMul } from '../../src/model/values'

const fields = [
  defineField({ key: 'scale', displayName: 'Scale', dataType: 'float', source: 'request', requestKey: 'Scale' }),
  defineField({ key: 'factor', displayName: 'Factor', dataType: 'float', source: 'userInput', defaultValue: 2 }),
  defineField({ key: 'extra', displayName: 'Extra', dataType: 'optionalFloat', source: 'userInput' }),
  defineField({ key: 'label', displayName: 'Label', source: 'request', requestKey: 'Label' }),
  defineField({ key: 'labelLength', displayName: 'Label length', dataType: 'float', dependsOn: ['label'] }),
  defineField({ key: 'product', displayName: 'Product', dataType: 'float', dependsOn: ['scale', 'factor'] }),
  defineField({ key: 'constant', displayName: 'Constant', dataType: 'float', source: 'fixed' }),
]
const registry = new FieldRegistry('toy', fields)
type ToyKey = (typeof fields)[number]['key']

const formulas: FormulaTable<ToyKey> = {
  product: s => safeMul(s.number('scale'), s.number('factor')),
  constant: () => 42,
}

// ── 1. Validation ───────────────────────────────────────────────

describe('validateFormulas', () => {
  it('accepts a complete table; request-only derivations need no formula', () => {
    expect(() => validateFormulas(registry, formulas)).not.toThrow()
  })

  it('requires a formula for fixed and derived fields', () => {
    expect(() => validateFormulas(registry, { product: formulas.product })).toThrow(
      'no formula for fixed field "constant"',
    )
    expect(() => validateFormulas(registry, { constant: () => 1 })).toThrow(
      'no formula for derived field "product"',
    )
  })

  it('rejects formulas on input fields', () => {
    expect(() => validateFormulas(registry, { ...formulas, factor: () => 1 })).toThrow(CatalogError)
  })

  it('rejects formulas for keys outside the catalog', () => {
    const loose: FormulaTable<string> = { ...formulas, ghost: () => 0 }
    expect(() => validateFormulas(registry, loose)).toThrow('formula for unknown key "ghost"')
  })
})

// ── 2. Evaluation ───────────────────────────────────────────────

describe('evaluate', () => {
  it('carries inputs and runs formulas', () => {
    const result = evaluate(registry, formulas, { scale: 3, label: 'abc', labelLength: 3 }, { factor: '5' })
    expect(result.toRecord()).toEqual({
      scale: 3,
      factor: 5,
      extra: null,
      label: 'abc',
      labelLength: 3,
      product: 15,
      constant: 42,
    })
  })

  it('uses the default for an omitted input and null for an omitted optional one', () => {
    const result = evaluate(registry, formulas, { scale: 3 }, {})
    expect(result.get('factor')).toBe(2)
    expect(result.get('product')).toBe(6)
    expect(result.get('extra')).toBeNull()
    expect(result.get('label')).toBeNull()
  })

  it('propagates a missing request value', () => {
    const result = evaluate(registry, formulas, {}, { factor: 5 })
    expect(result.get('product')).toBeNull()
  })

  it('a formula cannot read fields it does not declare', () => {
    const sneaky: FormulaTable<ToyKey> = { ...formulas, product: s => s.number('extra') }
    expect(() => evaluate(registry, sneaky, { scale: 1 }, {})).toThrow(
      'Formula for "product" reads undeclared dependency "extra"',
    )
  })

  it('passes the injected clock to formulas', () => {
    const dated: FormulaTable<ToyKey> = { ...formulas, constant: s => s.now().getFullYear() }
    const result = evaluate(registry, dated, {}, {}, { now: () => new Date(2030, 0, 1) })
    expect(result.get('constant')).toBe(2030)
  })
})

// ── 3. Operator coercion ────────────────────────────────────────

describe('coerceOperatorValue', () => {
  const status = defineField({
    key: 'status',
    displayName: 'Status',
    dataType: 'enum',
    source: 'userInput',
    enumValues: ['clear', 'cloudy'],
  })
  const flag = defineField({ key: 'flag', displayName: 'Flag', dataType: 'bool', source: 'userInput' })
  const note = defineField({ key: 'note', displayName: 'Note', source: 'userInput' })

  it('numbers fall back to the default, then null', () => {
    expect(coerceOperatorValue(registry.describe('factor'), 'x')).toBe(2)
    expect(coerceOperatorValue(registry.describe('extra'), 'x')).toBeNull()
    expect(coerceOperatorValue(registry.describe('extra'), 0)).toBe(0)
  })

  it('enums keep only allowed values', () => {
    expect(coerceOperatorValue(status, ' clear ')).toBe('clear')
    expect(coerceOperatorValue(status, 'muddy')).toBe('')
    expect(coerceOperatorValue(status, 3)).toBe('')
  })

  it('bools must be booleans', () => {
    expect(coerceOperatorValue(flag, true)).toBe(true)
    expect(coerceOperatorValue(flag, 'yes')).toBeNull()
  })

  it('strings are trimmed, missing is empty', () => {
    expect(coerceOperatorValue(note, '  ok ')).toBe('ok')
    expect(coerceOperatorValue(note, undefined)).toBe('')
  })
})
