/**
 * Conjugation request schema: field catalog of the task template.
 *
 * Requests arrive as flat key → value rows imported from the template
 * spreadsheet. This module normalizes those rows (keys, booleans, numbers,
 * target-quality lists) and orders them for display. It performs no
 * setup-parameter math; see rules/normalize.ts for that boundary.
 */

import { z } from 'zod'
import rawRequestFields from './requestFields.json'
import { ensureFloat } from '../model/values'

// ── Schema ───────────────────────────────────────────────────────

const requestFieldTypeSchema = z.enum([
  'string',
  'number',
  'string | null',
  'number | null',
  'bool',
  'list of objects',
])

export type RequestFieldType = z.infer<typeof requestFieldTypeSchema>

const requestFieldSchema = z.object({
  key: z.string().min(1),
  type: requestFieldTypeSchema,
  section: z.string(),
  optional: z.boolean(),
})

export type RequestField = z.infer<typeof requestFieldSchema>

export const REQUEST_FIELDS: readonly RequestField[] = z
  .array(requestFieldSchema)
  .parse(rawRequestFields)

/** One entry of the "ADC Target Quality" list. */
export const targetQualityItemSchema = z.object({
  check: z.string().default(''),
  requirement: z.string().default(''),
})

/** Import bookkeeping key passed through untouched. */
export const SHEET_NAME_KEY = '_sheet_name'

const FIELD_BY_KEY = new Map(REQUEST_FIELDS.map(f => [f.key, f]))

export function getRequestField(key: string): RequestField | undefined {
  return FIELD_BY_KEY.get(key)
}

// ── Coercion ─────────────────────────────────────────────────────

const TRUE_TOKENS = new Set(['1', 'Y', 'YES', 'TRUE', '是'])
const EMPTY_NUMBER_TOKENS = new Set(['', 'NA', 'N/A'])

export function coerceBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value
  if (value === null || value === undefined) return false
  return TRUE_TOKENS.has(String(value).trim().toUpperCase())
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (value === null || value === undefined) return null
  const text = String(value).trim()
  if (EMPTY_NUMBER_TOKENS.has(text.toUpperCase())) return null
  return ensureFloat(text)
}

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
}

function parseList(value: unknown): unknown {
  if (Array.isArray(value)) return value
  if (typeof value !== 'string') return value
  try {
    const parsed: unknown = JSON.parse(value)
    return Array.isArray(parsed) ? parsed : value
  } catch {
    return value
  }
}

export function coerceRequestValue(value: unknown, type: RequestFieldType, optional: boolean): unknown {
  if (isEmpty(value)) {
    if (optional) return null
    return type === 'string' || type === 'string | null' ? '' : null
  }
  switch (type) {
    case 'bool':
      return coerceBoolean(value)
    case 'number':
    case 'number | null': {
      const n = coerceNumber(value)
      // Required numbers keep the raw text so the operator can see what was typed
      return n ?? (optional ? null : value)
    }
    case 'list of objects':
      return parseList(value)
    default:
      return value
  }
}

/**
 * Normalize an imported request row: trim keys and coerce each value
 * by its schema type. Keys the schema does not know are treated as
 * optional strings.
 */
export function coerceRequestValues(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [rawKey, value] of Object.entries(record)) {
    if (rawKey === SHEET_NAME_KEY) {
      result[SHEET_NAME_KEY] = value
      continue
    }
    const key = rawKey.trim()
    const field = FIELD_BY_KEY.get(key)
    result[key] = coerceRequestValue(value, field?.type ?? 'string', field?.optional ?? true)
  }
  return result
}

// ── Display ──────────────────────────────────────────────────────

function formatTargetQuality(items: unknown[]): string {
  return items
    .map(item => {
      const parsed = targetQualityItemSchema.safeParse(item)
      return parsed.success ? `${parsed.data.check}: ${parsed.data.requirement}` : String(item)
    })
    .join(' | ')
}

export function formatRequestValue(value: unknown, type: RequestFieldType): string {
  if (value === null || value === undefined) return ''
  if (Array.isArray(value)) return formatTargetQuality(value)

  switch (type) {
    case 'number':
    case 'number | null':
      return String(value)
    case 'bool':
      if (typeof value === 'boolean') return value ? 'Yes' : 'No'
      return coerceBoolean(value) ? 'Yes' : String(value).trim()
    case 'list of objects': {
      const parsed = parseList(value)
      return Array.isArray(parsed) ? formatTargetQuality(parsed) : String(value).trim()
    }
    default:
      return String(value).trim()
  }
}

export interface RequestDisplayRow {
  key: string
  type: RequestFieldType
  requirement: 'required' | 'optional'
  display: string
}

/**
 * Rows in template order, including empty fields (shown as "null").
 * Keys outside the schema follow at the end as optional strings.
 */
export function orderedRequestItems(record: Readonly<Record<string, unknown>>): RequestDisplayRow[] {
  const rows: RequestDisplayRow[] = REQUEST_FIELDS.map(field => {
    const value = record[field.key]
    return {
      key: field.key,
      type: field.type,
      requirement: field.optional ? 'optional' : 'required',
      display: value === null || value === undefined ? 'null' : formatRequestValue(value, field.type),
    }
  })

  for (const [key, value] of Object.entries(record)) {
    if (key === SHEET_NAME_KEY || FIELD_BY_KEY.has(key.trim())) continue
    rows.push({
      key,
      type: 'string',
      requirement: 'optional',
      display: value === null || value === undefined ? 'null' : formatRequestValue(value, 'string'),
    })
  }

  return rows
}
