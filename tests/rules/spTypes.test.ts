import { describe, it, expect } from 'vitest'
import {
  getSupportedSetupParamTypes,
  listSetupParamTypes,
  lookupSetupParamType,
  resolveSetupParamType,
} from '../../src/rules/spTypes'
import { UnsupportedSetupParamTypeError } from '../../src/model/errors'
import { dar8Registry } from '../../src/rules/dar8/fields'
import { concentratedRequest, fixedNow, standardOperatorInputs } from '../fixtures/requests'

describe('resolveSetupParamType', () => {
  it('resolves DAR8 to its catalog and calculation', () => {
    const mod = resolveSetupParamType('DAR8')
    expect(mod.type).toBe('DAR8')
    expect(mod.registry).toBe(dar8Registry)

    const result = mod.calculate(mod.normalize(concentratedRequest()), standardOperatorInputs(), { now: fixedNow })
    expect(result.number('conjConcMgMl')).toBeCloseTo(8, 10)
  })

  it('rejects a planned type with UnsupportedSetupParamTypeError', () => {
    expect(() => resolveSetupParamType('DAR4')).toThrow(UnsupportedSetupParamTypeError)
    expect(() => resolveSetupParamType('DAR4')).toThrow(
      'Setup param type "DAR4" is not supported yet. Supported types: DAR8',
    )
  })

  it('rejects unknown names the same way', () => {
    expect(() => resolveSetupParamType('dar8')).toThrow(UnsupportedSetupParamTypeError)
  })
})

describe('lookupSetupParamType', () => {
  it('returns the module for a supported type', () => {
    const lookup = lookupSetupParamType('DAR8')
    expect(lookup.ok).toBe(true)
  })

  it('returns the error and no module for DAR4', () => {
    const lookup = lookupSetupParamType('DAR4')
    expect(lookup.ok).toBe(false)
    if (!lookup.ok) {
      expect(lookup.error).toBeInstanceOf(UnsupportedSetupParamTypeError)
      expect(lookup.error.typeName).toBe('DAR4')
      expect(lookup.error.supported).toEqual(['DAR8'])
      expect(lookup).not.toHaveProperty('module')
    }
  })
})

describe('listSetupParamTypes', () => {
  it('lists implemented types first, then placeholders', () => {
    expect(getSupportedSetupParamTypes()).toEqual(['DAR8'])
    expect(listSetupParamTypes()).toEqual([
      { type: 'DAR8', supported: true },
      { type: 'DAR4', supported: false },
      { type: 'Deblocking', supported: false },
      { type: 'Thiomab', supported: false },
    ])
  })
})
