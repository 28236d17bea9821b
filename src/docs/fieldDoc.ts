/**
 * Reference documentation for an SP field catalog, as Markdown.
 * Out-of-band only: nothing at run time reads this output.
 */

import { FIELD_GROUPS, FIELD_GROUP_TITLES } from '../model/types'
import type { FieldDescriptor } from '../model/types'
import type { SetupParamModule } from '../rules/spTypes'
import { NO_DEPENDENCIES_TEXT } from '../rules/explain'

function renderField(field: FieldDescriptor): string[] {
  const lines = [`- **${field.displayName}**`, `  - Key: \`${field.key}\``]
  if (field.unit) lines.push(`  - Unit: ${field.unit}`)
  lines.push(`  - Type: ${field.dataType}`)
  lines.push(`  - Source: ${field.source}`)
  if (field.requestKey) lines.push(`  - Request field: ${field.requestKey}`)
  if (field.defaultValue !== undefined) lines.push(`  - Default: ${field.defaultValue}`)
  if (field.enumValues) lines.push(`  - Values: ${field.enumValues.join(', ')}`)
  if (field.isImportant) lines.push('  - Important: check before dispensing')
  if (field.description) lines.push(`  - Description: ${field.description}`)
  if (field.dependsOn.length > 0) {
    lines.push(`  - Depends on: ${field.dependsOn.map(k => `\`${k}\``).join(', ')}`)
  } else {
    lines.push(`  - Depends on: ${NO_DEPENDENCIES_TEXT}`)
  }
  if (field.formulaText) lines.push(`  - Formula: ${field.formulaText}`)
  return lines
}

export function renderFieldDocMarkdown(mod: SetupParamModule): string {
  const lines: string[] = [`# ${mod.type} setup parameters`, '', mod.label]

  for (const group of FIELD_GROUPS) {
    const fields = mod.registry.listByGroup(group)
    if (fields.length === 0) continue
    lines.push('', `## ${FIELD_GROUP_TITLES[group]}`, '')
    for (const field of fields) {
      lines.push(...renderField(field))
    }
  }

  return lines.join('\n') + '\n'
}
