/**
 * Benchmark system type definitions
 */

import type { Bench, Task } from 'tinybench'

/**
 * Configuration for benchmark runs
 */
export interface BenchmarkConfig {
  /** Time in ms per benchmark (default: 1000) */
  time?: number
  /** Minimum number of iterations per benchmark */
  iterations?: number
  /** Whether to warm up before measuring (default: true) */
  warmup?: boolean
  /** Batch sizes to test */
  batchSizes?: number[]
  /** Output configuration */
  output?: OutputConfig
  /** Filter benchmarks by name pattern */
  filter?: string
  /** Filter by category */
  category?: string
}

/**
 * Output configuration
 */
export interface OutputConfig {
  /** Output to console (default: true) */
  console?: boolean
  /** Output to JSON file */
  json?: boolean
  /** Path for JSON output */
  jsonPath?: string
}

/**
 * Individual benchmark result
 */
export interface BenchmarkResult {
  name: string
  /** Operations per second */
  opsPerSec: number
  /** Mean time per operation in microseconds */
  meanUs: number
  stdDev: number
  minUs: number
  maxUs: number
  p75Us: number
  p99Us: number
  /** Number of samples */
  samples: number
  /** Relative margin of error (percentage) */
  rme: number
}

/**
 * Suite results
 */
export interface SuiteResult {
  name: string
  /** Category (pipeline, assembly) */
  category: string
  benchmarks: BenchmarkResult[]
  /** Total time to run suite in ms */
  duration: number
}

/**
 * Full benchmark results
 */
export interface BenchmarkResults {
  /** ISO timestamp */
  timestamp: string
  platform: PlatformInfo
  suites: SuiteResult[]
  /** Total duration in ms */
  totalDuration: number
}

export interface PlatformInfo {
  os: string
  arch: string
  nodeVersion: string
  cpus: number
}

/**
 * Benchmark suite definition
 */
export interface BenchmarkSuite {
  name: string
  /** Category (pipeline, assembly) */
  category: string
  /** Run the benchmark suite */
  run(config: BenchmarkConfig): Promise<Bench>
}

/**
 * Extract results from tinybench Task
 */
export function extractTaskResult(task: Task): BenchmarkResult | null {
  const result = task.result
  if (!result) return null

  const meanUs = result.mean * 1000 // ms to us

  return {
    name: task.name,
    opsPerSec: Math.round(result.hz),
    meanUs,
    stdDev: result.sd * 1000,
    minUs: result.min * 1000,
    maxUs: result.max * 1000,
    p75Us: result.p75 * 1000,
    p99Us: result.p99 * 1000,
    samples: result.samples.length,
    rme: result.rme,
  }
}
