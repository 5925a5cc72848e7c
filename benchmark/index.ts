/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   npm run bench                          # Run all benchmarks
 *   npm run bench -- --category pipeline
 *   npm run bench -- --filter dense
 *   npm run bench -- --json
 */

import { fileURLToPath } from 'node:url'
import { loadSuites, runSuites } from './lib/runner.js'
import type { BenchmarkConfig } from './lib/types.js'

/**
 * Parse command line arguments
 */
function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2)
  const output = { console: true, json: false }
  const config: BenchmarkConfig = {
    time: 1000,
    warmup: true,
    output,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const value = args[i + 1]

    if (arg === '--category' && value) {
      config.category = value
      i++
    } else if (arg === '--filter' && value) {
      config.filter = value
      i++
    } else if (arg === '--json') {
      output.json = true
    } else if (arg === '--time' && value) {
      config.time = parseInt(value, 10)
      i++
    } else if (arg === '--no-warmup') {
      config.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      printHelp()
      process.exit(0)
    }
  }

  return config
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
batchline Benchmark Suite

Usage:
  npm run bench -- [options]

Options:
  --category <name>   Filter by category (pipeline, assembly)
  --filter <pattern>  Filter benchmarks by name pattern
  --json              Output results to JSON file
  --time <ms>         Time per benchmark in ms (default: 1000)
  --no-warmup         Skip warmup phase
  --help, -h          Show this help message

Examples:
  npm run bench                           # Run all benchmarks
  npm run bench -- --category assembly    # Run batch assembly benchmarks only
  npm run bench -- --filter workers       # Run multi-worker benchmarks
  npm run bench -- --json                 # Save results to JSON
`)
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = parseArgs()
  const suites = await loadSuites(fileURLToPath(new URL('.', import.meta.url)))
  await runSuites(suites, config)
}

main().catch((err: unknown) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
