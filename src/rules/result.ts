/**
 * CalculationResult: immutable snapshot of one SP calculation.
 *
 * Holds exactly one value per descriptor of the catalog it was computed
 * against. Recomputing builds a new instance; nothing is patched in place.
 */

import type { FieldDescriptor, FieldValue } from '../model/types'
import { formatValue } from '../model/values'
import type { FieldRegistry } from './fieldRegistry'

export interface ResultEntry<K extends string = string> {
  descriptor: FieldDescriptor<K>
  value: FieldValue
  formatted: string
}

export class CalculationResult<K extends string = string> {
  readonly registry: FieldRegistry<K>
  private readonly values: ReadonlyMap<string, FieldValue>

  constructor(registry: FieldRegistry<K>, values: ReadonlyMap<string, FieldValue>) {
    this.registry = registry
    this.values = new Map(values)
    Object.freeze(this)
  }

  get catalog(): string {
    return this.registry.name
  }

  has(key: string): boolean {
    return this.registry.has(key)
  }

  /** Throws UnknownFieldError for keys outside the catalog. */
  get(key: string): FieldValue {
    this.registry.describe(key)
    return this.values.get(key) ?? null
  }

  /** Numeric value, or null when the field holds no number. */
  number(key: string): number | null {
    const v = this.get(key)
    return typeof v === 'number' ? v : null
  }

  descriptor(key: string): FieldDescriptor<K> {
    return this.registry.describe(key)
  }

  format(key: string): string {
    return formatValue(this.get(key))
  }

  /** Entries in catalog order. */
  entries(): ResultEntry<K>[] {
    return this.registry.all().map(descriptor => {
      const value = this.values.get(descriptor.key) ?? null
      return { descriptor, value, formatted: formatValue(value) }
    })
  }

  toRecord(): Record<string, FieldValue> {
    const record: Record<string, FieldValue> = {}
    for (const key of this.registry.keys()) {
      record[key] = this.values.get(key) ?? null
    }
    return record
  }

  /** Formatted values keyed by field key, for table display. */
  toDisplayRecord(): Record<string, string> {
    const record: Record<string, string> = {}
    for (const { descriptor, formatted } of this.entries()) {
      record[descriptor.key] = formatted
    }
    return record
  }
}
