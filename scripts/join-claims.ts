#!/usr/bin/env npx tsx
/**
 * Join Claims Script
 *
 * Joins the generator's CSV export into one transaction-level file.
 *
 * Usage:
 *   npx tsx scripts/join-claims.ts
 *
 * Or with custom parameters:
 *   npx tsx scripts/join-claims.ts --data-dir=synthea_output/csv --output=joined.csv
 *   npx tsx scripts/join-claims.ts --summary-output=claims_summary.csv --no-infer-types
 *   npx tsx scripts/join-claims.ts --log-level=debug
 *
 * Environment variables (also read from .env): CLAIMS_DATA_DIR, CLAIMS_OUTPUT_FILE,
 * CLAIMS_SUMMARY_OUTPUT_FILE, CLAIMS_DELIMITER, CLAIMS_INFER_TYPES, CLAIMS_LOG_LEVEL
 */

import 'dotenv/config'

import { ClaimsJoinBuilder } from '../src/builder/claims-join-builder.js'
import { formatTable, previewRows } from '../src/report/claims-summary.js'
import { isClaimsJoinError } from '../src/utils/errors.js'

interface CliArgs {
  dataDir?: string
  output?: string
  summaryOutput?: string
  delimiter?: string
  inferTypes?: boolean
  logLevel?: string
  quiet: boolean
}

function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { quiet: false }
  for (const arg of args) {
    const value = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : ''
    if (arg.startsWith('--data-dir=')) parsed.dataDir = value
    else if (arg.startsWith('--output=')) parsed.output = value
    else if (arg.startsWith('--summary-output=')) parsed.summaryOutput = value
    else if (arg.startsWith('--delimiter=')) parsed.delimiter = value
    else if (arg.startsWith('--log-level=')) parsed.logLevel = value
    else if (arg === '--no-infer-types') parsed.inferTypes = false
    else if (arg === '--quiet') parsed.quiet = true
    else throw new Error(`Unknown argument: ${arg}`)
  }
  return parsed
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))

  const builder = ClaimsJoinBuilder.create()
  if (args.dataDir) builder.dataDir(args.dataDir)
  if (args.output) builder.outputFile(args.output)
  if (args.summaryOutput) builder.summaryOutputFile(args.summaryOutput)
  if (args.delimiter) builder.delimiter(args.delimiter)
  if (args.inferTypes !== undefined) builder.inferTypes(args.inferTypes)
  if (args.logLevel) builder.logLevel(args.logLevel)
  if (args.quiet) builder.logLevel('warn')

  console.log('='.repeat(60))
  console.log('Claims Data Joiner')
  console.log('='.repeat(60))

  const result = await builder.build().run()

  if (result.summary && !args.quiet) {
    const sample = previewRows(result.summary.table)
    console.log(`\nSample claims (showing ${sample.rows.length} of ${result.summary.table.rows.length})`)
    for (const line of formatTable(sample)) {
      console.log(line)
    }
  }

  console.log('='.repeat(60))
  console.log('COMPLETE!')
  console.log('='.repeat(60))
}

main().catch((error: unknown) => {
  if (isClaimsJoinError(error)) {
    console.error(`✗ ${error.code}: ${error.message}`)
  } else {
    console.error(error)
  }
  process.exitCode = 1
})
