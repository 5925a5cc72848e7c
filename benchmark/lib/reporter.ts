/**
 * Benchmark result reporter
 * Outputs results to console and/or JSON files
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { BenchmarkResults, SuiteResult, BenchmarkResult, OutputConfig } from './types.js'
import { formatTime, formatOps, pad } from './utils.js'

/**
 * Reporter for benchmark results
 */
export class Reporter {
  private startTime = 0

  constructor(private config: OutputConfig = {}) {}

  private get toConsole(): boolean {
    return this.config.console !== false
  }

  start(numSuites: number): void {
    this.startTime = Date.now()

    if (this.toConsole) {
      console.log('')
      console.log('batchline Benchmark Suite')
      console.log('=========================')
      console.log(`${numSuites} suite(s)`)
      console.log('')
    }
  }

  suiteStart(name: string, category: string): void {
    if (this.toConsole) {
      console.log(`[${category}] ${name}`)
    }
  }

  suiteEnd(result: SuiteResult): void {
    if (this.toConsole) {
      for (const bench of result.benchmarks) {
        this.printBenchmark(bench)
      }
      console.log('')
    }
  }

  /**
   * One line per task: throughput, mean and tail latency
   */
  private printBenchmark(bench: BenchmarkResult): void {
    const name = pad(bench.name, 40)
    const ops = pad(`${formatOps(bench.opsPerSec)} ops/sec`, 16, 'right')
    const mean = pad(formatTime(bench.meanUs), 12, 'right')
    const p99 = pad(`p99 ${formatTime(bench.p99Us)}`, 16, 'right')
    const rme = `±${bench.rme.toFixed(1)}%`

    console.log(`  ${name} │ ${ops} │ ${mean} │ ${p99} │ ${rme}`)
  }

  finish(results: BenchmarkResults): void {
    const duration = Date.now() - this.startTime

    if (this.toConsole) {
      this.printSummary(results, duration)
    }

    if (this.config.json) {
      this.writeJson(results)
    }
  }

  private printSummary(results: BenchmarkResults, duration: number): void {
    const allBenchmarks = results.suites.flatMap((s) => s.benchmarks)

    if (allBenchmarks.length === 0) {
      console.log('No benchmarks were run.')
      return
    }

    const { os, arch, nodeVersion, cpus } = results.platform
    console.log('Summary')
    console.log('-------')
    console.log(`Platform: ${os}-${arch}, Node ${nodeVersion}, ${cpus} CPUs`)
    console.log(`Total benchmarks: ${allBenchmarks.length}`)
    console.log(`Total time: ${(duration / 1000).toFixed(1)}s`)
    for (const suite of results.suites) {
      const best = suite.benchmarks.reduce<BenchmarkResult | null>(
        (a, b) => (a === null || b.opsPerSec > a.opsPerSec ? b : a),
        null,
      )
      if (best) {
        console.log(`Fastest in ${suite.name}: ${best.name} @ ${formatOps(best.opsPerSec)} ops/sec`)
      }
    }
    console.log('')
  }

  private writeJson(results: BenchmarkResults): void {
    const outputDir = this.config.jsonPath ?? './benchmark/results'
    mkdirSync(outputDir, { recursive: true })

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const filepath = join(outputDir, `benchmark-${timestamp}.json`)

    writeFileSync(filepath, JSON.stringify(results, null, 2))
    console.log(`Results written to: ${filepath}`)
  }
}
