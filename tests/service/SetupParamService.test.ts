import { describe, it, expect, vi, beforeEach } from 'vitest'
import { SetupParamService } from '../../src/service/SetupParamService'
import type { ComputedEvent } from '../../src/service/SetupParamService'
import type { LoggerLike } from '../../src/utils/logger'
import { UnsupportedSetupParamTypeError } from '../../src/model/errors'
import { concentratedRequest, fixedNow, standardOperatorInputs } from '../fixtures/requests'

function stubLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerLike
}

describe('SetupParamService', () => {
  let log: ReturnType<typeof stubLogger>
  let service: SetupParamService

  beforeEach(() => {
    log = stubLogger()
    service = new SetupParamService('DAR8', { now: fixedNow, logger: log })
  })

  it('computes an empty sheet on construction', () => {
    expect(service.status).toBe('ready')
    expect(service.spType).toBe('DAR8')
    expect(service.version).toBe(1)
    expect(service.result?.get('addAntibodyMl')).toBeNull()
    expect(service.result?.get('tcepEq')).toBe(8)
  })

  it('recomputes on request and operator changes', () => {
    const versions: number[] = []
    service.on('computed', (event: ComputedEvent) => versions.push(event.version))

    service.setRequest(concentratedRequest())
    expect(service.version).toBe(2)
    expect(service.result?.number('addAntibodyMl')).toBe(5)

    const result = service.updateOperatorInputs(standardOperatorInputs())
    expect(service.version).toBe(3)
    expect(result).toBe(service.result)
    expect(result?.number('conjConcMgMl')).toBeCloseTo(8, 10)
    expect(result?.get('batchNo')).toBe('W1234-2603057')

    expect(versions).toEqual([2, 3])
  })

  it('builds a new result object on every recompute', () => {
    service.setRequest(concentratedRequest())
    const first = service.result
    service.recompute()
    expect(service.result).not.toBe(first)
    expect(service.result?.toRecord()).toEqual(first?.toRecord())
  })

  it('drops rejected operator inputs and keeps earlier values', () => {
    service.setRequest(concentratedRequest())
    service.updateOperatorInputs({ tcepEq: 6 })
    service.updateOperatorInputs({ tcepEq: -1, reactionStatus: 'foamy' })

    expect(service.result?.get('tcepEq')).toBe(6)
    expect(service.result?.get('reactionStatus')).toBe('')
    expect(service.inputIssues.map(i => i.key)).toEqual(['tcepEq', 'reactionStatus'])
    expect(log.warn).toHaveBeenCalledTimes(2)
    expect(log.warn).toHaveBeenCalledWith('Rejected operator input', {
      key: 'reactionStatus',
      reason: 'Expected one of: clear, cloudy, precipitate',
    })
  })

  it('enters the unsupported state for a planned type', () => {
    const unsupported = vi.fn()
    service.on('unsupported', unsupported)

    expect(service.selectType('DAR4')).toBe('unsupported')
    expect(service.status).toBe('unsupported')
    expect(service.spType).toBeNull()
    expect(service.result).toBeNull()
    expect(service.unsupportedError).toBeInstanceOf(UnsupportedSetupParamTypeError)
    expect(unsupported).toHaveBeenCalledTimes(1)
    expect(log.warn).toHaveBeenCalledWith('Unsupported setup param type', {
      spType: 'DAR4',
      supported: ['DAR8'],
    })

    expect(service.updateOperatorInputs({ tcepEq: 6 })).toBeNull()
    expect(service.recompute()).toBeNull()
    expect(service.explainText('addTcepMl')).toBeNull()
    expect(service.version).toBe(1)
  })

  it('recomputes from the kept request when switching back', () => {
    service.setRequest(concentratedRequest())
    service.updateOperatorInputs(standardOperatorInputs())
    service.selectType('DAR4')

    expect(service.selectType('DAR8')).toBe('ready')
    expect(service.unsupportedError).toBeNull()
    expect(service.version).toBe(4)
    // operator inputs start over for the new type: ratio back to 0 %
    expect(service.result?.get('conjOrgRatioPercent')).toBe(0)
    expect(service.result?.number('conjConcMgMl')).toBe(10)
  })

  it('starts in the unsupported state for an unknown type', () => {
    const other = new SetupParamService('Thiomab', { logger: log })
    expect(other.status).toBe('unsupported')
    expect(other.version).toBe(0)
    expect(other.setRequest(concentratedRequest())).toBeNull()
  })

  it('explains fields against the latest result', () => {
    service.setRequest(concentratedRequest())
    service.updateOperatorInputs(standardOperatorInputs())

    const explanation = service.explain('addAntibodyMl')
    expect(explanation?.formatted).toBe('5')
    expect(explanation?.dependencies.map(d => d.key)).toEqual(['reactionScaleMg', 'antibodyConcMgMl'])

    expect(service.explainText('reductionTimeH')?.split('\n')).toEqual([
      'Reduction Reaction time (h) [h]',
      'Value: 18',
      'Source: fixed',
      'Description: Reduction reaction time, fixed at 18 h.',
      'Formula: Fixed: 18 h.',
      'Depends on: none (raw input or fixed constant)',
    ])
  })

  it('logs each recompute at debug level', () => {
    expect(log.debug).toHaveBeenCalledWith('Setup params recomputed', { spType: 'DAR8', version: 1 })
  })
})
