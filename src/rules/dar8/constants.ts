/**
 * DAR8 protocol constants
 *
 * Agreed with the conjugation team; volumes in mL, concentrations in mg/mL.
 */

export const SP_TYPE = 'DAR8'

/** Antibody stock at or above this concentration is diluted with buffer (mg/mL) */
export const DILUTION_THRESHOLD_MG_ML = 11.5

/** Target mAb concentration in the reduction when diluting (mg/mL) */
export const DILUTED_REACTION_CONC_MG_ML = 10.0

/** 200 mM EDTA is added at 1% of the reduction volume */
export const EDTA_FRACTION = 0.01

/** mg / Da is mmol; mmol × eq / mM is litres; × 1000 gives mL */
export const MMOL_TO_ML_FACTOR = 1000

export const REACTION_TEMPERATURE_C = 22
export const REACTION_TIME_H = 18

export const REACTION_STATUSES = ['clear', 'cloudy', 'precipitate'] as const

export const DEFAULT_TCEP_EQ = 8
export const DEFAULT_TCEP_STOCK_MM = 8
export const DEFAULT_ORG_RATIO_PERCENT = 0
export const DEFAULT_LP_PER_AB = 12
