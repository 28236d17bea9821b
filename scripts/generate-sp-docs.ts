/**
 * Write the field reference for an SP type.
 * Run: npx tsx scripts/generate-sp-docs.ts [type] [outPath]
 */
import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { renderFieldDocMarkdown } from '../src/docs/fieldDoc'
import { lookupSetupParamType } from '../src/rules/spTypes'
import { logger } from '../src/utils/logger'

const ROOT = join(dirname(fileURLToPath(import.meta.url)), '..')

const [typeName = 'DAR8', outArg] = process.argv.slice(2)
const log = logger.child({ script: 'generate-sp-docs', spType: typeName })

const lookup = lookupSetupParamType(typeName)
if (!lookup.ok) {
  log.error(lookup.error.message, { supported: lookup.error.supported })
  process.exit(1)
}

const outPath = outArg ? resolve(outArg) : join(ROOT, 'docs', `sp-${typeName.toLowerCase()}.md`)
mkdirSync(dirname(outPath), { recursive: true })
writeFileSync(outPath, renderFieldDocMarkdown(lookup.module), 'utf-8')
log.info('Field reference written', { path: outPath, fields: lookup.module.registry.all().length })
