/**
 * Sensor Windows Example
 *
 * Streams fixed-size training batches out of a slow "remote" store of sensor
 * recordings: prefilter by a label known up front, reject flat windows, pick
 * one augmentation per sample, split off a validation set and train on the
 * union of two stations.
 *
 * Run with:
 *   npx tsx examples/sensor-windows.ts
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { Logger, runtime } from '@batchline/core'
import {
  Controllers,
  DataSource,
  Entity,
  type Controller,
  type EntityContext,
  type EntityId,
  type RetrievalAdapter,
  type Sample,
} from '@batchline/datasets'

runtime.initialize({ logLevel: 'info', seed: 1234 })

// ===============================
// Entities and retrieval
// ===============================

const WINDOW = 16

/**
 * One recording; the waveform is "downloaded" on first use and may be
 * evicted under memory pressure
 */
class Recording extends Entity<number[], number, number[]> {
  constructor(id: EntityId, context: EntityContext<number[], number>) {
    super(id)
    this.label = Number(id) % 3
    if (context.verbosity === 'debug') {
      Logger.debug(`Created recording ${id}`)
    }
  }

  async getSample(signal?: AbortSignal): Promise<Sample<number[], number>> {
    if (this.data === undefined) {
      await sleep(5, undefined, { signal })
      const seed = Number(this.uniqueId)
      this.data = Array.from({ length: 256 }, (_, i) => Math.sin((i + seed) / 8) * (seed % 4))
    }
    const start = Math.floor(Math.random() * (this.data.length - WINDOW))
    return { data: this.data.slice(start, start + WINDOW), label: this.label ?? 0 }
  }
}

/**
 * A station exposing recording ids; its cache is kept in memory for the
 * lifetime of the process
 */
class Station implements RetrievalAdapter<number[], number> {
  private cached: readonly Entity<number[], number>[] | null = null

  constructor(
    private readonly firstId: number,
    private readonly count: number,
  ) {}

  async list(): Promise<EntityId[]> {
    await sleep(20)
    return Array.from({ length: this.count }, (_, i) => this.firstId + i)
  }

  isCached(): boolean {
    return this.cached !== null
  }

  loadFromCache(): readonly Entity<number[], number>[] {
    return this.cached ?? []
  }

  cache(entities: readonly Entity<number[], number>[]): void {
    this.cached = entities
  }
}

// ===============================
// Controllers
// ===============================

const dropFlat: Controller<number[], number> = (sample) => sample.data.some((v) => Math.abs(v) > 1e-3)

const scale: Controller<number[], number> = (sample) => ({
  ...sample,
  data: sample.data.map((v) => v * 1.1),
})

const invert: Controller<number[], number> = (sample) => ({
  ...sample,
  data: sample.data.map((v) => -v),
})

// ===============================
// Main
// ===============================

async function main(): Promise<void> {
  const common = {
    createEntity: (id: EntityId, context: EntityContext<number[], number>) => new Recording(id, context),
    controllers: [Controllers.single(dropFlat), Controllers.oneOf(scale, invert)],
    prefilters: [function notLabelTwo(entity: Entity<number[], number>) { return entity.label !== 2 }],
    batchSize: 16,
    workers: 4,
    timeout: 500,
  }

  const north = await DataSource.create({ ...common, retrieval: new Station(0, 120) })
  const south = await DataSource.create({ ...common, retrieval: new Station(1000, 40) })

  const [train, validation] = await DataSource.split(north, 0.8)
  const combined = train.add(south)
  Logger.info(`Training on ${combined.length} recordings, weights ${combined.weights.map((w) => w.toFixed(2)).join(' / ')}`)

  let step = 0
  for await (const batch of combined) {
    if (batch.kind === 'dense') {
      Logger.info(`step ${step}: data ${batch.data.shape.join('x')}, labels ${batch.labels.shape.join('x')}`)
    }
    step += 1
    if (step === 5) await combined.close()
  }

  const check = await validation.next()
  if (check.kind === 'dense') {
    Logger.info(`validation batch: ${check.data.shape.join('x')}`)
  }
  await validation.close()

  Logger.info(`north/train stats: ${JSON.stringify(train.stats)}`)
}

main().catch((err: unknown) => {
  Logger.error('Example failed:', err)
  process.exit(1)
})
