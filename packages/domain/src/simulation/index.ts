// ---------------------------------------------------------------------------
// Simulation loop
// One Simulation owns one fleet and one mission queue. A cycle is a dispatch
// pass, a progression pass, then a status report, always in that order.
// ---------------------------------------------------------------------------

import { isDomainError, ValidationError } from '../shared/errors'
import type { DomainErrorCode } from '../shared/errors'
import type { EventSink } from '../events/index'
import { discardEvents } from '../events/index'
import type { Unit, UnitId, UnitStatus } from '../fleet/index'
import { describeUnit, toUnitStatus } from '../fleet/index'
import type { Mission, MissionId, MissionState, MissionStatus } from '../mission/index'
import { describeMission, isMissionCompleted, stepMission, toMissionStatus } from '../mission/index'
import { dispatchMission } from '../dispatch/index'

// ---------------------------------------------------------------------------
// Read models
// ---------------------------------------------------------------------------

export interface SimulationSnapshot {
  /** Number of cycles run so far. */
  readonly cycle: number
  readonly settled: boolean
  readonly units: readonly UnitStatus[]
  readonly missions: readonly MissionStatus[]
}

export interface MissionTransition {
  readonly missionId: MissionId
  readonly from: MissionState
  readonly to: MissionState
}

export interface StepFailure {
  readonly missionId: MissionId
  readonly code: DomainErrorCode
  readonly message: string
}

/** What happened during a single cycle. */
export interface CycleReport {
  readonly cycle: number
  /** Missions that received a unit in the dispatch pass. */
  readonly assigned: readonly MissionId[]
  /** Missions left PENDING because no unit qualified. */
  readonly unavailable: readonly MissionId[]
  /** Every state change, in the order it happened. */
  readonly transitions: readonly MissionTransition[]
  readonly failures: readonly StepFailure[]
  readonly snapshot: SimulationSnapshot
}

export interface SimulationOptions {
  /** Where events go. Defaults to discarding them. */
  readonly sink?: EventSink
}

export interface RunOptions {
  /** Stop before the cycle count is reached once every mission is COMPLETED. */
  readonly untilSettled?: boolean
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/**
 * An explicit simulation environment.
 *
 * @invariant After every cycle each unit is the assigned unit of at most one
 *            ASSIGNED or IN_PROGRESS mission.
 * @invariant Units and missions belong to exactly one Simulation; they must
 *            not be shared with another instance.
 */
export class Simulation {
  private readonly fleet: Unit[] = []
  private readonly queue: Mission[] = []
  private readonly sink: EventSink
  private cycleCount = 0

  constructor(options: SimulationOptions = {}) {
    this.sink = options.sink ?? discardEvents
  }

  get units(): readonly Unit[] {
    return this.fleet
  }

  get missions(): readonly Mission[] {
    return this.queue
  }

  /** Sink that receives every event this simulation emits. */
  get eventSink(): EventSink {
    return this.sink
  }

  /** Number of cycles run so far. */
  get cycle(): number {
    return this.cycleCount
  }

  /** @throws {ValidationError} if the id is taken or the unit is still serving a mission. */
  addUnit(unit: Unit): Unit {
    if (this.findUnit(unit.id) !== undefined) {
      throw new ValidationError(`Unit ${unit.id} is already part of the fleet`)
    }
    if (unit.currentMissionId !== undefined) {
      throw new ValidationError(`Unit ${unit.id} is still serving mission ${unit.currentMissionId}`)
    }
    this.fleet.push(unit)
    this.sink({ type: 'UNIT_ADDED', unitId: unit.id, variant: unit.variant })
    return unit
  }

  /** @throws {ValidationError} if the id is taken or the mission is not PENDING. */
  addMission(mission: Mission): Mission {
    if (this.findMission(mission.id) !== undefined) {
      throw new ValidationError(`Mission ${mission.id} is already queued`)
    }
    if (mission.state !== 'PENDING' || mission.assignedUnitId !== undefined) {
      throw new ValidationError(`Mission ${mission.id} must be PENDING and unassigned when queued`)
    }
    this.queue.push(mission)
    this.sink({ type: 'MISSION_ADDED', missionId: mission.id, kind: mission.kind })
    return mission
  }

  findUnit(id: string): Unit | undefined {
    return this.fleet.find((u) => u.id === id)
  }

  findMission(id: string): Mission | undefined {
    return this.queue.find((m) => m.id === id)
  }

  /** True when there is at least one mission and every mission is COMPLETED. */
  isSettled(): boolean {
    return this.queue.length > 0 && this.queue.every(isMissionCompleted)
  }

  snapshot(): SimulationSnapshot {
    return {
      cycle: this.cycleCount,
      settled: this.isSettled(),
      units: this.fleet.map(toUnitStatus),
      missions: this.queue.map(toMissionStatus),
    }
  }

  /**
   * Runs one cycle:
   *   1. dispatch every PENDING mission, in queue order
   *   2. step every assigned, non-completed mission, in queue order
   *   3. report the status of every unit and mission
   *
   * A DomainError raised while stepping one mission (e.g. a rescue load above
   * the unit's capacity) is reported and does not stop the pass; the mission
   * keeps its state and is retried next cycle. Any other error propagates.
   */
  runCycle(): CycleReport {
    const cycle = ++this.cycleCount
    const assigned: MissionId[] = []
    const unavailable: MissionId[] = []
    const transitions: MissionTransition[] = []
    const failures: StepFailure[] = []

    this.sink({ type: 'CYCLE_STARTED', cycle })

    for (const mission of this.queue) {
      if (mission.state !== 'PENDING') continue
      const unit = dispatchMission(mission, this.fleet, this.queue, this.sink)
      if (unit === undefined) {
        unavailable.push(mission.id)
      } else {
        assigned.push(mission.id)
        transitions.push({ missionId: mission.id, from: 'PENDING', to: 'ASSIGNED' })
      }
    }

    for (const mission of this.queue) {
      if (mission.assignedUnitId === undefined || isMissionCompleted(mission)) continue
      const from = mission.state
      try {
        stepMission(mission, this.findUnit(mission.assignedUnitId), this.sink)
      } catch (err) {
        if (!isDomainError(err)) throw err
        failures.push({ missionId: mission.id, code: err.code, message: err.message })
        this.sink({ type: 'MISSION_STEP_FAILED', missionId: mission.id, code: err.code, message: err.message })
      }
      if (mission.state !== from) {
        transitions.push({ missionId: mission.id, from, to: mission.state })
      }
    }

    this.sink({
      type: 'STATUS_REPORT',
      cycle,
      units: this.fleet.map(describeUnit),
      missions: this.queue.map(describeMission),
    })
    this.sink({ type: 'CYCLE_COMPLETED', cycle })

    return { cycle, assigned, unavailable, transitions, failures, snapshot: this.snapshot() }
  }

  /**
   * Runs `cycles` cycles back to back. With `untilSettled`, stops as soon as
   * every mission is COMPLETED, so fewer reports may be returned.
   */
  run(cycles: number, options: RunOptions = {}): CycleReport[] {
    const reports: CycleReport[] = []
    for (let i = 0; i < cycles; i++) {
      if (options.untilSettled === true && this.isSettled()) break
      reports.push(this.runCycle())
    }
    return reports
  }
}

/** Ids of units that are held by more than one active mission. Empty when the invariant holds. */
export function findDoubleBookedUnits(missions: readonly Mission[]): UnitId[] {
  const holders = new Map<UnitId, number>()
  for (const m of missions) {
    if (m.assignedUnitId === undefined || (m.state !== 'ASSIGNED' && m.state !== 'IN_PROGRESS')) continue
    holders.set(m.assignedUnitId, (holders.get(m.assignedUnitId) ?? 0) + 1)
  }
  return [...holders].filter(([, count]) => count > 1).map(([id]) => id)
}
