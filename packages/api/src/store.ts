// ---------------------------------------------------------------------------
// In-memory simulation store
//
// Each record exclusively owns one Simulation together with a capped log of
// the events it emitted. Nothing is shared between records.
// ---------------------------------------------------------------------------

import crypto from 'crypto'
import { Simulation } from '@fleetline/domain'
import type { SimulationEvent } from '@fleetline/domain'
import { config } from './config'
import { SimulationLimitError } from './lib/errors'

export interface LoggedEvent {
  /** 1-based, strictly increasing per simulation. Survives log trimming. */
  readonly seq: number
  readonly event: SimulationEvent
}

export interface SimulationRecord {
  readonly id: string
  readonly name?: string
  readonly createdAt: Date
  readonly simulation: Simulation
  /** Most recent events, oldest first, at most `eventLogLimit` entries. */
  readonly log: LoggedEvent[]
  /** Sequence number of the last event emitted. */
  lastSeq: number
}

export interface SimulationStoreOptions {
  readonly eventLogLimit: number
  readonly maxSimulations: number
}

export class SimulationStore {
  private readonly records = new Map<string, SimulationRecord>()

  constructor(private readonly options: SimulationStoreOptions) {}

  get size(): number {
    return this.records.size
  }

  /**
   * Creates a record and runs `seed` against its simulation. The record is
   * only stored if `seed` returns normally.
   *
   * @throws {SimulationLimitError} if the store is full.
   */
  create(seed: (simulation: Simulation) => void, name?: string): SimulationRecord {
    if (this.records.size >= this.options.maxSimulations) {
      throw new SimulationLimitError(this.options.maxSimulations)
    }
    const log: LoggedEvent[] = []
    const record: SimulationRecord = {
      id: crypto.randomUUID(),
      createdAt: new Date(),
      log,
      lastSeq: 0,
      simulation: new Simulation({
        sink: (event) => {
          record.lastSeq += 1
          log.push({ seq: record.lastSeq, event })
          if (log.length > this.options.eventLogLimit) log.splice(0, log.length - this.options.eventLogLimit)
        },
      }),
      ...(name !== undefined ? { name } : {}),
    }
    seed(record.simulation)
    this.records.set(record.id, record)
    return record
  }

  get(id: string): SimulationRecord | undefined {
    return this.records.get(id)
  }

  /** Records in creation order. */
  list(opts: { limit?: number; offset?: number } = {}): SimulationRecord[] {
    const offset = opts.offset ?? 0
    return [...this.records.values()].slice(offset, offset + (opts.limit ?? 50))
  }

  delete(id: string): boolean {
    return this.records.delete(id)
  }
}

export const store = new SimulationStore({
  eventLogLimit: config.eventLogLimit,
  maxSimulations: config.maxSimulations,
})
