/**
 * Benchmark runner - loads the *.bench.ts suites and runs the selected ones
 */

import { readdir } from 'node:fs/promises'
import { availableParallelism } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { Reporter } from './reporter.js'
import { extractTaskResult, type BenchmarkConfig, type BenchmarkResults, type BenchmarkSuite } from './types.js'

const CATEGORIES = ['pipeline', 'assembly'] as const

/**
 * Import the suite exported by every *.bench.ts under `baseDir`/<category>
 */
export async function loadSuites(baseDir: string): Promise<BenchmarkSuite[]> {
  const suites: BenchmarkSuite[] = []

  for (const category of CATEGORIES) {
    const dir = join(baseDir, category)
    const files = (await readdir(dir)).filter((file) => file.endsWith('.bench.ts')).sort()

    for (const file of files) {
      const module: { suite?: BenchmarkSuite } = await import(pathToFileURL(join(dir, file)).href)
      if (module.suite) suites.push(module.suite)
    }
  }

  return suites
}

function isSelected(suite: BenchmarkSuite, config: BenchmarkConfig): boolean {
  if (config.category && suite.category !== config.category) return false
  return !config.filter || suite.name.toLowerCase().includes(config.filter.toLowerCase())
}

/**
 * Run the suites matching `config.category` and `config.filter`, in order
 */
export async function runSuites(suites: readonly BenchmarkSuite[], config: BenchmarkConfig): Promise<BenchmarkResults> {
  const reporter = new Reporter(config.output)
  const selected = suites.filter((suite) => isSelected(suite, config))
  const startTime = Date.now()

  const results: BenchmarkResults = {
    timestamp: new Date().toISOString(),
    platform: {
      os: process.platform,
      arch: process.arch,
      nodeVersion: process.version,
      cpus: availableParallelism(),
    },
    suites: [],
    totalDuration: 0,
  }

  reporter.start(selected.length)
  for (const suite of selected) {
    reporter.suiteStart(suite.name, suite.category)

    const suiteStart = Date.now()
    const bench = await suite.run(config)
    const suiteResult = {
      name: suite.name,
      category: suite.category,
      benchmarks: bench.tasks.map(extractTaskResult).filter((result) => result !== null),
      duration: Date.now() - suiteStart,
    }

    results.suites.push(suiteResult)
    reporter.suiteEnd(suiteResult)
  }

  results.totalDuration = Date.now() - startTime
  reporter.finish(results)
  return results
}
