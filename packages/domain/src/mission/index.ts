// ---------------------------------------------------------------------------
// Mission bounded context
// Delivery and rescue tasks, and the state machine that moves them from
// PENDING to COMPLETED based on where their assigned unit currently is.
// ---------------------------------------------------------------------------

import type { Brand, Location } from '../shared/types'
import { formatKg, isNonBlank } from '../shared/types'
import { IllegalStateError, ValidationError } from '../shared/errors'
import type { EventSink } from '../events/index'
import type { Unit, UnitId } from '../fleet/index'
import { disableAutonomy, enableAutonomy, isAutonomyCapable, loadUnit, moveUnit, unloadUnit } from '../fleet/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a Mission within a simulation. */
export type MissionId = Brand<string, 'MissionId'>

export const toMissionId = (raw: string): MissionId => raw as MissionId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type MissionKind = 'URGENT_DELIVERY' | 'RESCUE'

export const MISSION_KINDS: readonly MissionKind[] = ['URGENT_DELIVERY', 'RESCUE'] as const

export const MISSION_KIND_LABELS: Record<MissionKind, string> = {
  URGENT_DELIVERY: 'Urgent delivery',
  RESCUE: 'Rescue mission',
}

/**
 * Lifecycle state of a Mission.
 *
 * Allowed transitions:
 *   PENDING → ASSIGNED → IN_PROGRESS → COMPLETED
 */
export type MissionState = 'PENDING' | 'ASSIGNED' | 'IN_PROGRESS' | 'COMPLETED'

/** Every state, in lifecycle order. */
export const MISSION_STATES: readonly MissionState[] = ['PENDING', 'ASSIGNED', 'IN_PROGRESS', 'COMPLETED'] as const

export const MISSION_STATE_LABELS: Record<MissionState, string> = {
  PENDING: 'Pending',
  ASSIGNED: 'Assigned',
  IN_PROGRESS: 'In progress',
  COMPLETED: 'Completed',
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * The Mission aggregate.
 *
 * @invariant `state` only ever moves forward along MISSION_STATES.
 * @invariant `assignedUnitId` is set iff `state` is not PENDING.
 */
export interface Mission {
  readonly id: MissionId
  readonly kind: MissionKind
  readonly origin: Location
  readonly destination: Location
  /** Weight to transport, in kilograms. Zero for rescues without cargo. */
  readonly payload: number
  /** Non-owning reference into the simulation's fleet. */
  assignedUnitId?: UnitId
  state: MissionState
}

export interface MissionSpec {
  readonly id: string
  readonly origin: Location
  readonly destination: Location
  readonly payload: number
}

/** Start and complete actions that differ between mission kinds. */
export interface MissionBehavior {
  start(mission: Mission, unit: Unit, sink: EventSink): void
  complete(mission: Mission, unit: Unit, sink: EventSink): void
}

export const MISSION_BEHAVIORS: Record<MissionKind, MissionBehavior> = {
  URGENT_DELIVERY: {
    start: (mission, unit, sink) => moveUnit(unit, mission.destination, sink),
    complete: (mission, unit, sink) => unloadUnit(unit, mission.payload, sink),
  },
  RESCUE: {
    start: (mission, unit, sink) => {
      moveUnit(unit, mission.destination, sink)
      if (isAutonomyCapable(unit)) enableAutonomy(unit, sink)
    },
    complete: (mission, unit, sink) => {
      loadUnit(unit, mission.payload, sink)
      if (isAutonomyCapable(unit)) disableAutonomy(unit, sink)
    },
  },
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

/** Returns the rule violations for a mission spec. An empty array means it is valid. */
export function validateMissionSpec(spec: MissionSpec): readonly string[] {
  const errors: string[] = []
  if (!isNonBlank(spec.id)) errors.push('Mission id must not be empty')
  if (!isNonBlank(spec.origin)) errors.push('Mission origin must not be empty')
  if (!isNonBlank(spec.destination)) errors.push('Mission destination must not be empty')
  if (!Number.isFinite(spec.payload) || spec.payload < 0) {
    errors.push('Mission payload must be zero or a positive number')
  }
  return errors
}

/** @throws {ValidationError} if any field is invalid. */
export function createMission(kind: MissionKind, spec: MissionSpec): Mission {
  const errors = validateMissionSpec(spec)
  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), errors)
  }
  return {
    id: toMissionId(spec.id),
    kind,
    origin: spec.origin,
    destination: spec.destination,
    payload: spec.payload,
    state: 'PENDING',
  }
}

/** Returns true when a mission can legally transition from `current` to `next`. */
export function canTransition(current: MissionState, next: MissionState): boolean {
  const allowed: Record<MissionState, readonly MissionState[]> = {
    PENDING: ['ASSIGNED'],
    ASSIGNED: ['IN_PROGRESS'],
    IN_PROGRESS: ['COMPLETED'],
    COMPLETED: [],
  }
  return allowed[current].includes(next)
}

function transition(mission: Mission, next: MissionState): void {
  if (!canTransition(mission.state, next)) {
    throw new IllegalStateError(`Cannot transition mission ${mission.id} from ${mission.state} to ${next}`)
  }
  mission.state = next
}

function requireAssignedUnit(mission: Mission, unit: Unit): void {
  if (unit.id !== mission.assignedUnitId) {
    throw new IllegalStateError(`Unit ${unit.id} is not assigned to mission ${mission.id}`)
  }
}

/** True while the mission holds its unit (ASSIGNED or IN_PROGRESS). */
export function isMissionActive(mission: Mission): boolean {
  return mission.state === 'ASSIGNED' || mission.state === 'IN_PROGRESS'
}

export function isMissionCompleted(mission: Mission): boolean {
  return mission.state === 'COMPLETED'
}

/**
 * Links the mission and the unit in both directions and moves the mission to
 * ASSIGNED.
 *
 * @throws {IllegalStateError} if the mission is not PENDING.
 */
export function assignMission(mission: Mission, unit: Unit, sink: EventSink): void {
  if (mission.state !== 'PENDING') {
    throw new IllegalStateError(`Mission ${mission.id} is ${mission.state} and cannot be assigned`)
  }
  mission.assignedUnitId = unit.id
  mission.state = 'ASSIGNED'
  unit.currentMissionId = mission.id
  sink({ type: 'UNIT_ASSIGNED', unitId: unit.id, missionId: mission.id })
}

/**
 * Runs the kind's start behaviour and moves the mission to IN_PROGRESS.
 *
 * @throws {IllegalStateError} if `unit` is not the assigned unit or the mission is not ASSIGNED.
 */
export function startMission(mission: Mission, unit: Unit | undefined, sink: EventSink): void {
  if (unit === undefined) {
    throw new IllegalStateError(`Mission ${mission.id} cannot start without an assigned unit`)
  }
  requireAssignedUnit(mission, unit)
  if (!canTransition(mission.state, 'IN_PROGRESS')) {
    throw new IllegalStateError(`Mission ${mission.id} is ${mission.state} and cannot start`)
  }
  sink({
    type: 'MISSION_STARTED',
    missionId: mission.id,
    kind: mission.kind,
    origin: mission.origin,
    destination: mission.destination,
  })
  MISSION_BEHAVIORS[mission.kind].start(mission, unit, sink)
  transition(mission, 'IN_PROGRESS')
}

/**
 * Runs the kind's complete behaviour, then marks the mission COMPLETED and
 * releases the unit's back-reference. If the behaviour throws, the mission
 * stays IN_PROGRESS.
 *
 * @throws {IllegalStateError} if `unit` is not the assigned unit or the mission is not IN_PROGRESS.
 */
export function completeMission(mission: Mission, unit: Unit | undefined, sink: EventSink): void {
  if (unit === undefined) {
    throw new IllegalStateError(`Mission ${mission.id} cannot complete without an assigned unit`)
  }
  requireAssignedUnit(mission, unit)
  if (!canTransition(mission.state, 'COMPLETED')) {
    throw new IllegalStateError(`Mission ${mission.id} is ${mission.state} and cannot complete`)
  }
  MISSION_BEHAVIORS[mission.kind].complete(mission, unit, sink)
  transition(mission, 'COMPLETED')
  if (unit.currentMissionId === mission.id) unit.currentMissionId = undefined
  sink({ type: 'MISSION_COMPLETED', missionId: mission.id, kind: mission.kind })
}

export type StepOutcome = 'STARTED' | 'COMPLETED' | 'EN_ROUTE' | 'IDLE'

/**
 * Advances the mission by at most one transition, judged by where its unit
 * is right now:
 *
 *   ASSIGNED    and unit at origin      → start    → IN_PROGRESS
 *   IN_PROGRESS and unit at destination → complete → COMPLETED
 *   otherwise                           → "en route", no transition
 *
 * PENDING and COMPLETED missions are left alone (`IDLE`).
 *
 * @throws {IllegalStateError} if `unit` is not the mission's assigned unit.
 */
export function stepMission(mission: Mission, unit: Unit | undefined, sink: EventSink): StepOutcome {
  if (mission.state === 'PENDING' || mission.state === 'COMPLETED') return 'IDLE'
  if (unit === undefined) {
    throw new IllegalStateError(`Mission ${mission.id} is ${mission.state} but has no assigned unit`)
  }
  requireAssignedUnit(mission, unit)
  if (mission.state === 'ASSIGNED' && unit.location === mission.origin) {
    startMission(mission, unit, sink)
    return 'STARTED'
  }
  if (mission.state === 'IN_PROGRESS' && unit.location === mission.destination) {
    completeMission(mission, unit, sink)
    return 'COMPLETED'
  }
  sink({ type: 'MISSION_EN_ROUTE', missionId: mission.id, unitId: unit.id, destination: mission.destination })
  return 'EN_ROUTE'
}

// ---------------------------------------------------------------------------
// Read model
// ---------------------------------------------------------------------------

/** One-line status of a mission. Pure read. */
export function describeMission(mission: Mission): string {
  return (
    `Mission ID: ${mission.id} (${MISSION_KIND_LABELS[mission.kind]}), Origin: ${mission.origin}, ` +
    `Destination: ${mission.destination}, Payload: ${formatKg(mission.payload)}, ` +
    `State: ${MISSION_STATE_LABELS[mission.state]}, Unit: ${mission.assignedUnitId ?? 'none'}`
  )
}

export interface MissionStatus {
  readonly id: MissionId
  readonly kind: MissionKind
  readonly origin: Location
  readonly destination: Location
  readonly payload: number
  readonly state: MissionState
  readonly completed: boolean
  readonly assignedUnitId?: UnitId
  readonly status: string
}

export function toMissionStatus(mission: Mission): MissionStatus {
  return {
    id: mission.id,
    kind: mission.kind,
    origin: mission.origin,
    destination: mission.destination,
    payload: mission.payload,
    state: mission.state,
    completed: isMissionCompleted(mission),
    status: describeMission(mission),
    ...(mission.assignedUnitId !== undefined ? { assignedUnitId: mission.assignedUnitId } : {}),
  }
}
