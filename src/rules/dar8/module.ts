import type { SetupParamModule } from '../spTypes'
import { calculateDar8, normalizeDar8Request } from './calculate'
import { SP_TYPE } from './constants'
import { dar8Registry } from './fields'
import type { Dar8FieldKey } from './fields'

export const dar8Module: SetupParamModule<Dar8FieldKey> = {
  type: SP_TYPE,
  label: 'DAR8 (interchain cysteine, full reduction)',
  registry: dar8Registry,
  normalize: normalizeDar8Request,
  calculate: calculateDar8,
}
