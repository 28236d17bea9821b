/**
 * Field Metadata Registry
 *
 * Read-only catalog of FieldDescriptors for one SP type. Validated once in
 * the constructor (unique keys, resolvable dependencies, no cycles), then
 * shared by every calculation.
 */

import type { FieldDescriptor, FieldGroup } from '../model/types'
import { FIELD_GROUPS } from '../model/types'
import { CatalogError, UnknownFieldError } from '../model/errors'

export type FieldInit<K extends string> = Pick<FieldDescriptor<K>, 'key' | 'displayName'> &
  Partial<Omit<FieldDescriptor<K>, 'key' | 'displayName'>>

/**
 * Build a frozen descriptor with catalog defaults filled in.
 * Defaults: derived string in the meta group, no dependencies.
 */
export function defineField<K extends string>(init: FieldInit<K>): FieldDescriptor<K> {
  const field: FieldDescriptor<K> = {
    unit: '',
    dataType: 'string',
    source: 'derived',
    group: 'meta',
    formulaText: '',
    description: '',
    isImportant: false,
    ...init,
    dependsOn: Object.freeze([...(init.dependsOn ?? [])]),
  }
  return Object.freeze(field)
}

function byDisplayName(a: FieldDescriptor, b: FieldDescriptor): number {
  const x = a.displayName.toLowerCase()
  const y = b.displayName.toLowerCase()
  return x < y ? -1 : x > y ? 1 : 0
}

export class FieldRegistry<K extends string = string> {
  readonly name: string
  private readonly fields: readonly FieldDescriptor<K>[]
  private readonly byKey: Map<string, FieldDescriptor<K>>
  private readonly order: readonly K[]

  constructor(name: string, fields: readonly FieldDescriptor<K>[]) {
    this.name = name
    this.fields = Object.freeze([...fields])
    this.byKey = new Map()
    for (const f of this.fields) {
      if (!this.byKey.has(f.key)) this.byKey.set(f.key, f)
    }
    this.validate()
    this.order = Object.freeze(this.topologicalSort())
  }

  /** Checks key uniqueness and that every dependency resolves in this catalog. */
  validate(): void {
    const problems: string[] = []
    const seen = new Set<string>()

    for (const f of this.fields) {
      if (seen.has(f.key)) problems.push(`duplicate key "${f.key}"`)
      seen.add(f.key)

      for (const dep of f.dependsOn) {
        if (dep === f.key) {
          problems.push(`"${f.key}" depends on itself`)
        } else if (!this.byKey.has(dep)) {
          problems.push(`"${f.key}" depends on unknown key "${dep}"`)
        }
      }
    }

    if (problems.length > 0) throw new CatalogError(this.name, problems)
  }

  has(key: string): key is K {
    return this.byKey.has(key)
  }

  describe(key: string): FieldDescriptor<K> {
    const field = this.byKey.get(key)
    if (!field) throw new UnknownFieldError(key, this.name)
    return field
  }

  /** Descriptors in catalog order. */
  all(): readonly FieldDescriptor<K>[] {
    return this.fields
  }

  keys(): K[] {
    return this.fields.map(f => f.key)
  }

  /** Descriptors of one group, sorted by display name. */
  listByGroup(group: FieldGroup): FieldDescriptor<K>[] {
    return this.fields.filter(f => f.group === group).sort(byDisplayName)
  }

  /** Every descriptor, by group display order then display name. */
  listOrdered(): FieldDescriptor<K>[] {
    return FIELD_GROUPS.flatMap(group => this.listByGroup(group))
  }

  /** Keys ordered so each field comes after all of its dependencies. */
  evaluationOrder(): readonly K[] {
    return this.order
  }

  private topologicalSort(): K[] {
    const inDegree = new Map<string, number>()
    const dependents = new Map<string, K[]>()

    for (const f of this.fields) {
      inDegree.set(f.key, f.dependsOn.length)
      dependents.set(f.key, [])
    }
    for (const f of this.fields) {
      for (const dep of f.dependsOn) {
        dependents.get(dep)?.push(f.key)
      }
    }

    const queue: K[] = this.fields.filter(f => f.dependsOn.length === 0).map(f => f.key)
    const sorted: K[] = []
    while (queue.length > 0) {
      const key = queue.shift()
      if (key === undefined) break
      sorted.push(key)
      for (const next of dependents.get(key) ?? []) {
        const remaining = (inDegree.get(next) ?? 0) - 1
        inDegree.set(next, remaining)
        if (remaining === 0) queue.push(next)
      }
    }

    if (sorted.length !== this.fields.length) {
      const placed = new Set<string>(sorted)
      const remaining = this.fields.filter(f => !placed.has(f.key)).map(f => f.key)
      throw new CatalogError(this.name, [`cycle detected involving: ${remaining.join(', ')}`])
    }

    return sorted
  }
}
