/**
 * Input Normalizer
 *
 * Turns an upstream request record (external names, loosely typed cells)
 * into the internal keys a catalog expects. Copies and coerces only:
 * cross-field formulas belong to the calculation engine.
 */

import type { FieldDescriptor, FieldValue, NormalizedRequest, RequestRecord } from '../model/types'
import { ensureFloat } from '../model/values'
import { coerceBoolean } from '../request/schema'
import type { FieldRegistry } from './fieldRegistry'

/** Derives a field from already-normalized request fields (e.g. a number out of "10 mM"). */
export type RequestExtractor = (normalized: NormalizedRequest) => FieldValue

/**
 * Request text as shown to the operator. Numbers keep only their integer
 * part, matching how the template stores IDs (7.0 → "7").
 */
export function requestText(raw: unknown): string {
  if (raw === null || raw === undefined) return ''
  if (typeof raw === 'number') return Number.isFinite(raw) ? String(Math.trunc(raw)) : ''
  return String(raw).trim()
}

function coerceRequestField(field: FieldDescriptor, raw: unknown): FieldValue {
  switch (field.dataType) {
    case 'float':
    case 'optionalFloat':
      return ensureFloat(raw)
    case 'bool':
      return coerceBoolean(raw)
    case 'string':
    case 'enum':
      return requestText(raw)
  }
}

export function normalizeRequest<K extends string>(
  registry: FieldRegistry<K>,
  record: RequestRecord,
  extractors: Partial<Record<K, RequestExtractor>> = {},
): NormalizedRequest {
  const normalized: Record<string, FieldValue> = {}

  for (const field of registry.all()) {
    if (field.source !== 'request') continue
    normalized[field.key] = coerceRequestField(field, record[field.requestKey ?? field.displayName])
  }

  for (const field of registry.all()) {
    const extract = extractors[field.key]
    if (extract) normalized[field.key] = extract(normalized)
  }

  return normalized
}
