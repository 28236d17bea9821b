/**
 * DAR8: formulas for the reduction and conjugation set-up
 *
 * Inputs (request + operator) are carried by the engine; every other
 * field of the catalog has a formula here, keyed by field. Formulas read
 * only their declared dependencies through the scope and return null as
 * soon as a numeric input is missing.
 */

import type {
  CalculateOptions,
  NormalizedRequest,
  OperatorInputs,
  RequestRecord,
} from '../../model/types'
import { parseLeadingNumber, safeDiv, safeMul, safeSub, safeSum } from '../../model/values'
import { evaluate, validateFormulas } from '../engine'
import type { FormulaTable } from '../engine'
import { normalizeRequest } from '../normalize'
import type { RequestExtractor } from '../normalize'
import type { CalculationResult } from '../result'
import {
  DILUTED_REACTION_CONC_MG_ML,
  DILUTION_THRESHOLD_MG_ML,
  EDTA_FRACTION,
  MMOL_TO_ML_FACTOR,
  REACTION_TEMPERATURE_C,
  REACTION_TIME_H,
} from './constants'
import { dar8Registry } from './fields'
import type { Dar8FieldKey } from './fields'

// ── Helpers ──────────────────────────────────────────────────────

/** Stock volume (mL) delivering `eq` equivalents per antibody. */
export function reagentVolumeMl(
  scaleMg: number | null,
  mwDa: number | null,
  eq: number | null,
  stockMm: number | null,
): number | null {
  return safeMul(safeDiv(safeMul(safeDiv(scaleMg, mwDa), eq), stockMm), MMOL_TO_ML_FACTOR)
}

/** Concentrated stocks are diluted; the rest run neat. Decided per call, never cached. */
export function isDilutionBranch(antibodyConcMgMl: number): boolean {
  return antibodyConcMgMl >= DILUTION_THRESHOLD_MG_ML
}

function edtaVolumeMl(antibodyMl: number | null, tcepMl: number | null, bufferMl: number | null): number | null {
  return safeMul(EDTA_FRACTION, safeSum(antibodyMl, tcepMl, bufferMl))
}

function ratioFraction(percent: number | null): number | null {
  return safeDiv(percent, 100)
}

/** YYMMDD in local time. */
export function formatBatchDate(date: Date): string {
  const yy = String(date.getFullYear() % 100).padStart(2, '0')
  const mm = String(date.getMonth() + 1).padStart(2, '0')
  const dd = String(date.getDate()).padStart(2, '0')
  return `${yy}${mm}${dd}`
}

// ── Normalizer extractors ────────────────────────────────────────

export const DAR8_EXTRACTORS: Partial<Record<Dar8FieldKey, RequestExtractor>> = {
  lpConcMm: normalized => parseLeadingNumber(normalized.lpConcText),
}

// ── Formulas ─────────────────────────────────────────────────────

export const DAR8_FORMULAS: FormulaTable<Dar8FieldKey> = {
  addAntibodyMl: s => safeDiv(s.number('reactionScaleMg'), s.number('antibodyConcMgMl')),

  addTcepMl: s =>
    reagentVolumeMl(s.number('reactionScaleMg'), s.number('mwAntibodyDa'), s.number('tcepEq'), s.number('tcepStockMm')),

  mabConcReductionMgMl: s => {
    const conc = s.number('antibodyConcMgMl')
    if (conc === null) return null
    if (isDilutionBranch(conc)) return DILUTED_REACTION_CONC_MG_ML

    // Undiluted: no buffer, so EDTA is 1% of antibody + TCEP
    const antibody = s.number('addAntibodyMl')
    const tcep = s.number('addTcepMl')
    return safeSum(antibody, edtaVolumeMl(antibody, tcep, 0), tcep)
  },

  reductionTotalVolumeMl: s => safeDiv(s.number('reactionScaleMg'), s.number('mabConcReductionMgMl')),

  addBufferMl: s => {
    const conc = s.number('antibodyConcMgMl')
    if (conc === null) return null
    if (!isDilutionBranch(conc)) return 0

    const total = s.number('reductionTotalVolumeMl')
    return safeSub(total, s.number('addAntibodyMl'), s.number('addTcepMl'), safeMul(total, EDTA_FRACTION))
  },

  addEdtaMl: s => edtaVolumeMl(s.number('addAntibodyMl'), s.number('addTcepMl'), s.number('addBufferMl')),

  reductionTemperatureC: () => REACTION_TEMPERATURE_C,
  reductionTimeH: () => REACTION_TIME_H,

  addAdditionalTcepMl: s => {
    const eq = s.number('addAdditionalTcepEq')
    if (eq === null) return null
    return reagentVolumeMl(s.number('reactionScaleMg'), s.number('mwAntibodyDa'), eq, s.number('tcepStockMm'))
  },

  batchNo: s => {
    const code = s.text('wbpCode')
    const id = s.text('requestId')
    if (code === '' && id === '') return ''
    return `${code}-${formatBatchDate(s.now())}${id}`
  },

  conjOrgRatioPercentOut: s => s.number('conjOrgRatioPercent'),
  conjOrgRatioUnit: s => s.text('dissolvedIn'),
  xLpPerAbOut: s => s.number('xLpPerAb'),

  conjTotalVolumeMl: s => {
    const fraction = ratioFraction(s.number('conjOrgRatioPercent'))
    return safeDiv(s.number('reductionTotalVolumeMl'), safeSub(1, fraction))
  },

  addLpStockMl: s =>
    reagentVolumeMl(s.number('reactionScaleMg'), s.number('mwAntibodyDa'), s.number('xLpPerAb'), s.number('lpConcMm')),

  addOrgSolventMl: s => {
    const fraction = ratioFraction(s.number('conjOrgRatioPercent'))
    return safeSub(safeMul(s.number('conjTotalVolumeMl'), fraction), s.number('addLpStockMl'))
  },

  conjConcMgMl: s => safeDiv(s.number('reactionScaleMg'), s.number('conjTotalVolumeMl')),

  conjTemperatureC: () => REACTION_TEMPERATURE_C,
  conjTimeH: () => REACTION_TIME_H,

  addAdditionalLpOut: s => s.number('addAdditionalLp'),
  additionalReactionTimeHOut: s => s.number('additionalReactionTimeH'),
}

validateFormulas(dar8Registry, DAR8_FORMULAS)

// ── Entry points ─────────────────────────────────────────────────

export function normalizeDar8Request(record: RequestRecord): NormalizedRequest {
  return normalizeRequest(dar8Registry, record, DAR8_EXTRACTORS)
}

export function calculateDar8(
  request: NormalizedRequest,
  operator: OperatorInputs,
  options?: CalculateOptions,
): CalculationResult<Dar8FieldKey> {
  return evaluate(dar8Registry, DAR8_FORMULAS, request, operator, options)
}
