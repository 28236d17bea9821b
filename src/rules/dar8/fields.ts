/**
 * DAR8 field catalog
 *
 * One descriptor per value on the DAR8 setup sheet. Order here is the
 * order of the UI table; evaluation order comes from `dependsOn`.
 */

import { defineField, FieldRegistry } from '../fieldRegistry'
import {
  DEFAULT_LP_PER_AB,
  DEFAULT_ORG_RATIO_PERCENT,
  DEFAULT_TCEP_EQ,
  DEFAULT_TCEP_STOCK_MM,
  REACTION_STATUSES,
  SP_TYPE,
} from './constants'

export const DAR8_FIELDS = [
  // ── Request inputs ─────────────────────────────────────────────
  defineField({
    key: 'antibodyConcMgMl',
    displayName: 'Antibody concentration (mg/mL)',
    unit: 'mg/mL',
    dataType: 'float',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'Antibody concention (mg/mL)',
    description: 'Antibody stock concentration from the request.',
  }),
  defineField({
    key: 'reactionScaleMg',
    displayName: 'Reaction Scale (mg)',
    unit: 'mg',
    dataType: 'float',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'Reaction Scale (mg)',
    description: 'Amount of antibody to conjugate.',
  }),
  defineField({
    key: 'mwAntibodyDa',
    displayName: 'MW of antibody (Da)',
    unit: 'Da',
    dataType: 'float',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'MW of antibody (Da)',
    description: 'Antibody molecular weight from the request.',
  }),
  defineField({
    key: 'dissolvedIn',
    displayName: 'Dissolved in',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'Dissolved in',
    description: 'Organic solvent the linker-payload is dissolved in.',
  }),
  defineField({
    key: 'lpConcText',
    displayName: 'LP concentration (as entered)',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'LP浓度',
    description: "LP concentration text from the request, e.g. '10 mM'.",
  }),
  defineField({
    key: 'lpConcMm',
    displayName: 'LP concentration (mM)',
    unit: 'mM',
    dataType: 'float',
    group: 'inputRequest',
    dependsOn: ['lpConcText'],
    description: 'Leading number of the LP concentration text; N/A when the text does not start with one.',
    formulaText: "Leading numeric part of LP concentration, e.g. '10 mM' -> 10.",
  }),
  defineField({
    key: 'wbpCode',
    displayName: 'WBP Code',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'WBP Code',
    description: 'Project code from the request; prefix of the batch number.',
  }),
  defineField({
    key: 'requestId',
    displayName: 'ID',
    source: 'request',
    group: 'inputRequest',
    requestKey: 'ID',
    description: 'Request row ID; suffix of the batch number.',
  }),

  // ── Operator inputs ────────────────────────────────────────────
  defineField({
    key: 'tcepEq',
    displayName: 'TCEP (eq)',
    unit: 'eq',
    dataType: 'float',
    source: 'userInput',
    group: 'inputUser',
    defaultValue: DEFAULT_TCEP_EQ,
    description: `TCEP equivalents per antibody. Defaults to ${DEFAULT_TCEP_EQ}.`,
  }),
  defineField({
    key: 'tcepStockMm',
    displayName: 'TCEP stock (mM)',
    unit: 'mM',
    dataType: 'float',
    source: 'userInput',
    group: 'inputUser',
    defaultValue: DEFAULT_TCEP_STOCK_MM,
    description: `TCEP stock concentration. Defaults to ${DEFAULT_TCEP_STOCK_MM} mM.`,
  }),
  defineField({
    key: 'conjOrgRatioPercent',
    displayName: 'Conjugation organic solvent ratio (%)',
    unit: '%',
    dataType: 'float',
    source: 'userInput',
    group: 'inputUser',
    defaultValue: DEFAULT_ORG_RATIO_PERCENT,
    description: 'Organic solvent share of the conjugation volume, 0–100.',
    formulaText: 'ratio fraction = ratio (%) / 100, e.g. 20 % -> 0.20.',
  }),
  defineField({
    key: 'xLpPerAb',
    displayName: 'x LP/Ab',
    dataType: 'float',
    source: 'userInput',
    group: 'inputUser',
    defaultValue: DEFAULT_LP_PER_AB,
    description: `Linker-payload equivalents per antibody. Defaults to ${DEFAULT_LP_PER_AB}.`,
  }),
  defineField({
    key: 'addAdditionalTcepEq',
    displayName: 'Add additional TCEP (eq)',
    unit: 'eq',
    dataType: 'optionalFloat',
    source: 'userInput',
    group: 'inputUser',
    description: 'Optional extra TCEP equivalents, only when a second reduction shot is needed.',
  }),
  defineField({
    key: 'addAdditionalLp',
    displayName: 'Add additional LP',
    dataType: 'optionalFloat',
    source: 'userInput',
    group: 'inputUser',
    description: 'Optional extra linker-payload amount, as agreed by the operator.',
  }),
  defineField({
    key: 'additionalReactionTimeH',
    displayName: 'Additional reaction time (h)',
    unit: 'h',
    dataType: 'optionalFloat',
    source: 'userInput',
    group: 'inputUser',
    description: 'Optional extra reaction time.',
  }),
  defineField({
    key: 'reactionStatus',
    displayName: 'Reaction status',
    dataType: 'enum',
    source: 'userInput',
    group: 'inputUser',
    enumValues: REACTION_STATUSES,
    description: `Operator's observation of the reaction: ${REACTION_STATUSES.join(' / ')}.`,
  }),

  // ── Reduction outputs ──────────────────────────────────────────
  defineField({
    key: 'addAntibodyMl',
    displayName: 'Add antibody (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputReduction',
    isImportant: true,
    dependsOn: ['reactionScaleMg', 'antibodyConcMgMl'],
    description: 'Volume of antibody stock to add.',
    formulaText: 'Add antibody (mL) = Reaction Scale (mg) / Antibody concentration (mg/mL).',
  }),
  defineField({
    key: 'addTcepMl',
    displayName: 'Add TCEP (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputReduction',
    isImportant: true,
    dependsOn: ['reactionScaleMg', 'mwAntibodyDa', 'tcepEq', 'tcepStockMm'],
    description: 'Volume of TCEP stock to add.',
    formulaText: 'Add TCEP (mL) = Reaction Scale (mg) / MW of antibody (Da) * TCEP (eq) / TCEP stock (mM) * 1000.',
  }),
  defineField({
    key: 'addBufferMl',
    displayName: 'Add buffer to adjust Ab conc. (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputReduction',
    isImportant: true,
    dependsOn: ['antibodyConcMgMl', 'reductionTotalVolumeMl', 'addAntibodyMl', 'addTcepMl'],
    description: 'Buffer that dilutes a concentrated antibody stock down to the target reaction concentration.',
    formulaText:
      'If Antibody concentration >= 11.5: Reduction Total volume - Add antibody - Add TCEP ' +
      '- Reduction Total volume * 0.01; otherwise 0.',
  }),
  defineField({
    key: 'addEdtaMl',
    displayName: 'Add 200mM EDTA (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputReduction',
    isImportant: true,
    dependsOn: ['addAntibodyMl', 'addTcepMl', 'addBufferMl'],
    description: 'Volume of 200 mM EDTA to add.',
    formulaText: 'Add 200mM EDTA (mL) = 0.01 * (Add antibody + Add TCEP + Add buffer).',
  }),
  defineField({
    key: 'batchNo',
    displayName: 'Batch#',
    group: 'meta',
    dependsOn: ['wbpCode', 'requestId'],
    description: 'Batch number WBP Code-YYMMDDID, where YYMMDD is the calculation date.',
    formulaText: "Batch# = WBP Code + '-' + today (YYMMDD) + ID.",
  }),
  defineField({
    key: 'mabConcReductionMgMl',
    displayName: 'mAb conc. in reaction (mg/mL)',
    unit: 'mg/mL',
    dataType: 'float',
    group: 'outputReduction',
    dependsOn: ['antibodyConcMgMl', 'addAntibodyMl', 'addTcepMl'],
    description:
      'mAb concentration in the reduction. Below 11.5 mg/mL the reduction volumes are summed ' +
      '(a unit convention agreed with the conjugation team); otherwise the stock is diluted to 10.',
    formulaText:
      'If Antibody concentration < 11.5: Add antibody + Add 200mM EDTA + Add TCEP, where Add buffer is 0 ' +
      'so Add 200mM EDTA = 0.01 * (Add antibody + Add TCEP); otherwise 10.0.',
  }),
  defineField({
    key: 'reductionTotalVolumeMl',
    displayName: 'Reduction Total volume (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputReduction',
    dependsOn: ['reactionScaleMg', 'mabConcReductionMgMl'],
    description: 'Volume of the reduction mixture.',
    formulaText: 'Reduction Total volume (mL) = Reaction Scale (mg) / mAb conc. in reaction (mg/mL).',
  }),
  defineField({
    key: 'reductionTemperatureC',
    displayName: 'Reduction Reaction temperature (°C)',
    unit: '°C',
    dataType: 'float',
    source: 'fixed',
    group: 'outputReduction',
    description: 'Reduction reaction temperature, fixed at 22 °C.',
    formulaText: 'Fixed: 22 °C.',
  }),
  defineField({
    key: 'reductionTimeH',
    displayName: 'Reduction Reaction time (h)',
    unit: 'h',
    dataType: 'float',
    source: 'fixed',
    group: 'outputReduction',
    description: 'Reduction reaction time, fixed at 18 h.',
    formulaText: 'Fixed: 18 h.',
  }),
  defineField({
    key: 'addAdditionalTcepMl',
    displayName: 'Add additional TCEP (mL)',
    unit: 'mL',
    dataType: 'optionalFloat',
    group: 'outputReduction',
    dependsOn: ['reactionScaleMg', 'mwAntibodyDa', 'addAdditionalTcepEq', 'tcepStockMm'],
    description: 'Extra TCEP volume; N/A unless additional TCEP equivalents were entered.',
    formulaText:
      'Only with Add additional TCEP (eq): Reaction Scale (mg) / MW of antibody (Da) ' +
      '* Add additional TCEP (eq) / TCEP stock (mM) * 1000.',
  }),

  // ── Conjugation outputs ────────────────────────────────────────
  defineField({
    key: 'conjOrgRatioPercentOut',
    displayName: 'Conjugation organic solvent ratio (%, output)',
    unit: '%',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['conjOrgRatioPercent'],
    description: 'Organic solvent ratio as used for the conjugation.',
    formulaText: 'Copy of the operator input.',
  }),
  defineField({
    key: 'conjOrgRatioUnit',
    displayName: 'Unit of conjugation organic solvent ratio',
    group: 'outputConjugation',
    dependsOn: ['dissolvedIn'],
    description: 'Solvent the ratio refers to.',
    formulaText: 'Copy of Dissolved in from the request.',
  }),
  defineField({
    key: 'xLpPerAbOut',
    displayName: 'x LP/Ab (output)',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['xLpPerAb'],
    description: 'Linker-payload equivalents as used for the conjugation.',
    formulaText: 'Copy of the operator input.',
  }),
  defineField({
    key: 'conjTotalVolumeMl',
    displayName: 'Conjugation Total volume (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['reductionTotalVolumeMl', 'conjOrgRatioPercent'],
    description: 'Volume of the conjugation mixture after adding organic solvent.',
    formulaText: 'Conjugation Total volume (mL) = Reduction Total volume (mL) / (1 - ratio (%) / 100).',
  }),
  defineField({
    key: 'addLpStockMl',
    displayName: 'Add stock LP solution (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['reactionScaleMg', 'mwAntibodyDa', 'xLpPerAb', 'lpConcMm'],
    description: 'N/A when the LP concentration could not be read.',
    formulaText: 'Add stock LP solution (mL) = Reaction Scale (mg) / MW of antibody (Da) * x LP/Ab / LP concentration (mM) * 1000.',
  }),
  defineField({
    key: 'addOrgSolventMl',
    displayName: 'Add organic solvent to reaction (mL)',
    unit: 'mL',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['conjTotalVolumeMl', 'conjOrgRatioPercent', 'addLpStockMl'],
    description: 'Organic solvent on top of the solvent brought in by the LP stock.',
    formulaText: 'Add organic solvent (mL) = Conjugation Total volume (mL) * ratio (%) / 100 - Add stock LP solution (mL).',
  }),
  defineField({
    key: 'conjConcMgMl',
    displayName: 'Conjugation Concentration (mg/mL)',
    unit: 'mg/mL',
    dataType: 'float',
    group: 'outputConjugation',
    dependsOn: ['reactionScaleMg', 'conjTotalVolumeMl'],
    description: 'Antibody concentration in the conjugation mixture.',
    formulaText: 'Conjugation Concentration (mg/mL) = Reaction Scale (mg) / Conjugation Total volume (mL).',
  }),
  defineField({
    key: 'conjTemperatureC',
    displayName: 'Conjugation Reaction temperature (°C)',
    unit: '°C',
    dataType: 'float',
    source: 'fixed',
    group: 'outputConjugation',
    description: 'Conjugation reaction temperature, fixed at 22 °C.',
    formulaText: 'Fixed: 22 °C.',
  }),
  defineField({
    key: 'conjTimeH',
    displayName: 'Conjugation Reaction time (h)',
    unit: 'h',
    dataType: 'float',
    source: 'fixed',
    group: 'outputConjugation',
    description: 'Conjugation reaction time, fixed at 18 h.',
    formulaText: 'Fixed: 18 h.',
  }),
  defineField({
    key: 'addAdditionalLpOut',
    displayName: 'Add additional LP (output)',
    dataType: 'optionalFloat',
    group: 'outputConjugation',
    dependsOn: ['addAdditionalLp'],
    description: 'Extra linker-payload, as entered by the operator.',
    formulaText: 'Copy of the operator input; N/A when not entered.',
  }),
  defineField({
    key: 'additionalReactionTimeHOut',
    displayName: 'Additional reaction time (h, output)',
    unit: 'h',
    dataType: 'optionalFloat',
    group: 'outputConjugation',
    dependsOn: ['additionalReactionTimeH'],
    description: 'Extra reaction time, as entered by the operator.',
    formulaText: 'Copy of the operator input; N/A when not entered.',
  }),
]

export type Dar8FieldKey = (typeof DAR8_FIELDS)[number]['key']

export const dar8Registry = new FieldRegistry<Dar8FieldKey>(SP_TYPE, DAR8_FIELDS)
