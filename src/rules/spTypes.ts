/**
 * Setup Param Type Registry
 *
 * Maps an SP type name → SetupParamModule (catalog + normalizer +
 * calculation), so callers dispatch by the type selected on the request.
 *
 * Adding a new SP type:
 * 1. Create src/rules/<type>/fields.ts: the field catalog
 * 2. Create src/rules/<type>/calculate.ts: formulas and entry points
 * 3. Export a module from src/rules/<type>/module.ts and register it here
 *
 * The engine itself never changes.
 */

import type {
  CalculateOptions,
  NormalizedRequest,
  OperatorInputs,
  RequestRecord,
} from '../model/types'
import { UnsupportedSetupParamTypeError } from '../model/errors'
import type { FieldRegistry } from './fieldRegistry'
import type { CalculationResult } from './result'
import { dar8Module } from './dar8/module'

// ── Interface ────────────────────────────────────────────────────

export interface SetupParamModule<K extends string = string> {
  type: string
  label: string

  /** Field catalog shared by every calculation of this type. */
  registry: FieldRegistry<K>

  /** Request record → internal request keys. */
  normalize: (record: RequestRecord) => NormalizedRequest

  calculate: (
    request: NormalizedRequest,
    operator: OperatorInputs,
    options?: CalculateOptions,
  ) => CalculationResult<K>
}

export type SetupParamLookup =
  | { ok: true; module: SetupParamModule }
  | { ok: false; error: UnsupportedSetupParamTypeError }

// ── Registry ─────────────────────────────────────────────────────

const SP_MODULES: Map<string, SetupParamModule> = new Map([
  [dar8Module.type, dar8Module],
])

/** Types the lab works with whose set-up sheets are not modelled yet. */
const PLANNED_SP_TYPES = ['DAR4', 'Deblocking', 'Thiomab']

export function getSupportedSetupParamTypes(): string[] {
  return [...SP_MODULES.keys()].sort()
}

export function listSetupParamTypes(): { type: string; supported: boolean }[] {
  return [
    ...getSupportedSetupParamTypes().map(type => ({ type, supported: true })),
    ...PLANNED_SP_TYPES.map(type => ({ type, supported: false })),
  ]
}

/**
 * Resolve the module for an SP type.
 * Throws for planned and unknown types alike.
 */
export function resolveSetupParamType(typeName: string): SetupParamModule {
  const mod = SP_MODULES.get(typeName)
  if (!mod) {
    throw new UnsupportedSetupParamTypeError(typeName, getSupportedSetupParamTypes())
  }
  return mod
}

/** Non-throwing variant for callers that show a "not supported" state. */
export function lookupSetupParamType(typeName: string): SetupParamLookup {
  const mod = SP_MODULES.get(typeName)
  if (mod) return { ok: true, module: mod }
  return {
    ok: false,
    error: new UnsupportedSetupParamTypeError(typeName, getSupportedSetupParamTypes()),
  }
}
