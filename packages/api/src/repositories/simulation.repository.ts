import {
  createMission,
  createUnit,
  disableAutonomy,
  enableAutonomy,
  formatEvent,
  toMissionStatus,
  toUnitStatus,
  toggleMedium,
} from '@fleetline/domain'
import type {
  CycleReport,
  MissionKind,
  MissionStatus,
  Simulation,
  SimulationEvent,
  SimulationSnapshot,
  UnitStatus,
  UnitVariant,
} from '@fleetline/domain'
import type { LoggedEvent, SimulationRecord, SimulationStore } from '../store'

// ---------------------------------------------------------------------------
// Read models
// ---------------------------------------------------------------------------

export type SimulationView = SimulationSnapshot & {
  id: string
  name?: string
  createdAt: Date
}

export type SimulationSummary = {
  id: string
  name?: string
  createdAt: Date
  cycle: number
  settled: boolean
  unitCount: number
  missionCount: number
}

export type EventView = {
  seq: number
  type: SimulationEvent['type']
  line: string
  event: SimulationEvent
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapSimulation(record: SimulationRecord): SimulationView {
  return {
    id: record.id,
    createdAt: record.createdAt,
    ...record.simulation.snapshot(),
    ...(record.name !== undefined ? { name: record.name } : {}),
  }
}

function mapSummary(record: SimulationRecord): SimulationSummary {
  const sim = record.simulation
  return {
    id: record.id,
    createdAt: record.createdAt,
    cycle: sim.cycle,
    settled: sim.isSettled(),
    unitCount: sim.units.length,
    missionCount: sim.missions.length,
    ...(record.name !== undefined ? { name: record.name } : {}),
  }
}

function mapEvent(entry: LoggedEvent): EventView {
  return { seq: entry.seq, type: entry.event.type, line: formatEvent(entry.event), event: entry.event }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export type CreateUnitInput = {
  variant: UnitVariant
  id: string
  capacity: number
  location: string
}

export type CreateMissionInput = {
  kind: MissionKind
  id: string
  origin: string
  destination: string
  payload: number
}

export type CreateSimulationInput = {
  name?: string
  units?: CreateUnitInput[]
  missions?: CreateMissionInput[]
}

function seedUnit(sim: Simulation, input: CreateUnitInput): UnitStatus {
  const { variant, ...spec } = input
  return toUnitStatus(sim.addUnit(createUnit(variant, spec)))
}

function seedMission(sim: Simulation, input: CreateMissionInput): MissionStatus {
  const { kind, ...spec } = input
  return toMissionStatus(sim.addMission(createMission(kind, spec)))
}

/**
 * Creates a simulation, optionally pre-populated. Either every unit and
 * mission is accepted or nothing is stored.
 */
export function createSimulation(store: SimulationStore, input: CreateSimulationInput = {}): SimulationView {
  const record = store.create((sim) => {
    for (const unit of input.units ?? []) seedUnit(sim, unit)
    for (const mission of input.missions ?? []) seedMission(sim, mission)
  }, input.name)
  return mapSimulation(record)
}

export function findSimulationById(store: SimulationStore, id: string): SimulationView | null {
  const record = store.get(id)
  return record ? mapSimulation(record) : null
}

/** Lists simulations in creation order, with optional pagination. */
export function listSimulations(
  store: SimulationStore,
  opts: { limit?: number; offset?: number } = {},
): SimulationSummary[] {
  return store.list(opts).map(mapSummary)
}

export function simulationExists(store: SimulationStore, id: string): boolean {
  return store.get(id) !== undefined
}

export function deleteSimulation(store: SimulationStore, id: string): boolean {
  return store.delete(id)
}

export function addUnit(store: SimulationStore, simulationId: string, input: CreateUnitInput): UnitStatus | null {
  const record = store.get(simulationId)
  if (!record) return null
  return seedUnit(record.simulation, input)
}

export function addMission(
  store: SimulationStore,
  simulationId: string,
  input: CreateMissionInput,
): MissionStatus | null {
  const record = store.get(simulationId)
  if (!record) return null
  return seedMission(record.simulation, input)
}

/** Runs cycles and returns their reports plus every event they emitted that is still in the log. */
export function runCycles(
  store: SimulationStore,
  simulationId: string,
  opts: { count: number; untilSettled?: boolean },
): { reports: CycleReport[]; events: EventView[] } | null {
  const record = store.get(simulationId)
  if (!record) return null
  const before = record.lastSeq
  const reports = record.simulation.run(opts.count, { untilSettled: opts.untilSettled ?? false })
  const events = record.log.filter((e) => e.seq > before).map(mapEvent)
  return { reports, events }
}

/** Returns the `limit` most recent events, oldest first. */
export function listEvents(store: SimulationStore, simulationId: string, opts: { limit?: number } = {}): EventView[] | null {
  const record = store.get(simulationId)
  if (!record) return null
  const limit = opts.limit ?? 100
  return record.log.slice(Math.max(record.log.length - limit, 0)).map(mapEvent)
}

/**
 * Switches a unit's autonomy. Air units refuse to switch it off; the refusal
 * is logged and the returned status still shows autonomy enabled.
 *
 * Returns null when the unit does not exist.
 */
export function setUnitAutonomy(
  store: SimulationStore,
  simulationId: string,
  unitId: string,
  enabled: boolean,
): UnitStatus | null {
  const record = store.get(simulationId)
  const unit = record?.simulation.findUnit(unitId)
  if (!record || !unit) return null
  const sink = record.simulation.eventSink
  if (enabled) enableAutonomy(unit, sink)
  else disableAutonomy(unit, sink)
  return toUnitStatus(unit)
}

/** Flips an amphibious unit between land and water. Returns null when the unit does not exist. */
export function toggleUnitMedium(store: SimulationStore, simulationId: string, unitId: string): UnitStatus | null {
  const record = store.get(simulationId)
  const unit = record?.simulation.findUnit(unitId)
  if (!record || !unit) return null
  toggleMedium(unit, record.simulation.eventSink)
  return toUnitStatus(unit)
}
