/**
 * Batching Benchmarks
 *
 * Compares inline batching against the background pipeline when every sample
 * waits on simulated I/O.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { Logger } from '@batchline/core'
import { DataSource, Entity, type RetrievalAdapter, type Sample } from '@batchline/datasets'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { createBench, runBench } from '../lib/utils.js'

const FETCH_DELAY_MS = 1
const NUM_ENTITIES = 256

class RemoteRecord extends Entity<number[], number, number[]> {
  async getSample(signal?: AbortSignal): Promise<Sample<number[], number>> {
    if (this.data === undefined) {
      await sleep(FETCH_DELAY_MS, undefined, { signal })
      const n = Number(this.uniqueId)
      this.data = [n, n + 1, n + 2, n + 3]
    }
    return { data: this.data, label: Number(this.uniqueId) % 10 }
  }
}

/**
 * Retrieval without a cache, so every run fetches each record once and then
 * keeps it until eviction
 */
const retrieval: RetrievalAdapter<number[], number> = {
  list: () => Array.from({ length: NUM_ENTITIES }, (_, i) => i),
  isCached: () => false,
  loadFromCache: () => [],
  cache: () => undefined,
}

/**
 * Memory probe pinned above any threshold, so raw data is evicted after every
 * sample and each batch pays for its fetches
 */
const alwaysUnderPressure = (): number => 1

export const suite: BenchmarkSuite = {
  name: 'Batching',
  category: 'pipeline',

  async run(config: BenchmarkConfig) {
    Logger.setLevel('error')
    const bench = createBench(config)
    const sources: DataSource<number[], number>[] = []

    for (const workers of [1, 4, 16]) {
      const source = await DataSource.create({
        retrieval,
        createEntity: (id) => new RemoteRecord(id),
        batchSize: 32,
        workers,
        maxMemPercent: 0.5,
        memoryProbe: alwaysUnderPressure,
      })
      sources.push(source)

      bench.add(`next() batch 32, ${workers} worker(s)`, async () => {
        await source.next()
      })
    }

    try {
      return await runBench(bench, config)
    } finally {
      await Promise.all(sources.map((source) => source.close()))
    }
  },
}
