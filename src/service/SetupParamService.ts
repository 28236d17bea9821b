/**
 * SetupParamService: one operator's setup-parameter session.
 *
 * Holds the request record, the operator inputs and the selected SP type,
 * and rebuilds the whole result on every change. Extends EventEmitter so
 * a UI can listen for `computed` and drop any result whose version is
 * older than the last one it rendered.
 */

import { EventEmitter } from 'node:events'
import type { CalculateOptions, NormalizedRequest, OperatorInputs, RequestRecord } from '../model/types'
import type { UnsupportedSetupParamTypeError } from '../model/errors'
import { parseOperatorInputs } from '../model/schemas'
import type { OperatorInputIssue } from '../model/schemas'
import { coerceRequestValues } from '../request/schema'
import { explainField, explainLine } from '../rules/explain'
import type { FieldExplanation } from '../rules/explain'
import type { CalculationResult } from '../rules/result'
import { lookupSetupParamType } from '../rules/spTypes'
import type { SetupParamModule } from '../rules/spTypes'
import { logger as rootLogger } from '../utils/logger'
import type { LoggerLike } from '../utils/logger'

export type SetupParamStatus = 'ready' | 'unsupported'

export interface ComputedEvent {
  version: number
  result: CalculationResult
}

export interface SetupParamServiceOptions extends CalculateOptions {
  logger?: LoggerLike
}

export class SetupParamService extends EventEmitter {
  status: SetupParamStatus = 'ready'
  unsupportedError: UnsupportedSetupParamTypeError | null = null
  result: CalculationResult | null = null
  version = 0
  inputIssues: OperatorInputIssue[] = []

  private module: SetupParamModule | null = null
  private rawRequest: RequestRecord = {}
  private request: NormalizedRequest = {}
  private operator: OperatorInputs = {}
  private readonly options: CalculateOptions
  private readonly log: LoggerLike

  constructor(spType: string, options: SetupParamServiceOptions = {}) {
    super()
    this.options = { now: options.now }
    this.log = options.logger ?? rootLogger.child({ component: 'setup-params' })
    this.selectType(spType)
  }

  get spType(): string | null {
    return this.module?.type ?? null
  }

  /** Switch SP type. An unsupported type clears the result instead of throwing. */
  selectType(spType: string): SetupParamStatus {
    const lookup = lookupSetupParamType(spType)
    if (!lookup.ok) {
      this.module = null
      this.status = 'unsupported'
      this.unsupportedError = lookup.error
      this.result = null
      this.log.warn('Unsupported setup param type', { spType, supported: lookup.error.supported })
      this.emit('unsupported', lookup.error)
      return this.status
    }

    if (this.module?.type !== lookup.module.type) this.operator = {}
    this.module = lookup.module
    this.status = 'ready'
    this.unsupportedError = null
    this.request = lookup.module.normalize(this.rawRequest)
    this.recompute()
    return this.status
  }

  /** Import a request row from the task template. */
  setRequest(record: RequestRecord): CalculationResult | null {
    this.rawRequest = coerceRequestValues(record)
    this.request = this.module ? this.module.normalize(this.rawRequest) : {}
    return this.recompute()
  }

  /** Merge operator inputs; invalid fields are dropped and reported in `inputIssues`. */
  updateOperatorInputs(raw: Readonly<Record<string, unknown>>): CalculationResult | null {
    if (!this.module) return null

    const { inputs, issues } = parseOperatorInputs(this.module.registry, raw)
    this.inputIssues = issues
    for (const issue of issues) {
      this.log.warn('Rejected operator input', { key: issue.key, reason: issue.message })
    }
    this.operator = { ...this.operator, ...inputs }
    return this.recompute()
  }

  /** Build a fresh result from the current inputs. */
  recompute(): CalculationResult | null {
    if (!this.module) return null

    const result = this.module.calculate(this.request, this.operator, this.options)
    this.version++
    this.result = result
    this.log.debug('Setup params recomputed', { spType: this.module.type, version: this.version })

    const event: ComputedEvent = { version: this.version, result }
    this.emit('computed', event)
    return result
  }

  explain(key: string): FieldExplanation | null {
    return this.result ? explainField(this.result, key) : null
  }

  explainText(key: string): string | null {
    return this.result ? explainLine(this.result, key) : null
  }
}
