/**
 * Dense Assembly Benchmarks
 *
 * Tests packing collected samples into typed arrays at various batch sizes.
 */

import { BatchAssembler, type Sample } from '@batchline/datasets'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { STANDARD_BATCH_SIZES, createBench, runBench } from '../lib/utils.js'

const FEATURES = 64

function makeSamples(batchSize: number): Sample<number[], number>[] {
  return Array.from({ length: batchSize }, (_, i) => ({
    data: Array.from({ length: FEATURES }, (_, j) => i * FEATURES + j),
    label: i % 10,
  }))
}

export const suite: BenchmarkSuite = {
  name: 'Dense Assembly',
  category: 'assembly',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)
    const raw = new BatchAssembler({ convert: false, dtype: 'float32' })
    const float32 = new BatchAssembler({ convert: true, dtype: 'float32' })
    const float64 = new BatchAssembler({ convert: true, dtype: 'float64' })

    for (const batchSize of config.batchSizes ?? STANDARD_BATCH_SIZES) {
      const samples = makeSamples(batchSize)
      const label = `[${batchSize}, ${FEATURES}]`

      bench.add(`raw ${label}`, () => {
        raw.assemble(samples)
      })

      bench.add(`float32 ${label}`, () => {
        float32.assemble(samples)
      })

      bench.add(`float64 ${label}`, () => {
        float64.assemble(samples)
      })
    }

    return runBench(bench, config)
  },
}
