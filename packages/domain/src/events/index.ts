// ---------------------------------------------------------------------------
// Reporting sink
// Every meaningful action in the engine is emitted as a structured event.
// Callers decide where events go: console, an in-memory log, or nowhere.
// ---------------------------------------------------------------------------

import type { Location } from '../shared/types'
import { formatKg, formatMetres } from '../shared/types'
import type { DomainErrorCode } from '../shared/errors'
import { UNIT_VARIANT_LABELS } from '../fleet/index'
import type { UnitId, UnitVariant } from '../fleet/index'
import { MISSION_KIND_LABELS } from '../mission/index'
import type { MissionId, MissionKind } from '../mission/index'

export type SimulationEvent =
  | { readonly type: 'UNIT_ADDED'; readonly unitId: UnitId; readonly variant: UnitVariant }
  | { readonly type: 'MISSION_ADDED'; readonly missionId: MissionId; readonly kind: MissionKind }
  | { readonly type: 'CYCLE_STARTED'; readonly cycle: number }
  | { readonly type: 'UNIT_ASSIGNED'; readonly unitId: UnitId; readonly missionId: MissionId }
  | { readonly type: 'DISPATCH_UNAVAILABLE'; readonly missionId: MissionId; readonly origin: Location }
  | {
      readonly type: 'UNIT_MOVING'
      readonly unitId: UnitId
      readonly variant: UnitVariant
      readonly destination: Location
    }
  | {
      readonly type: 'UNIT_DROVE'
      readonly unitId: UnitId
      readonly variant: 'GROUND' | 'AMPHIBIOUS'
      /** Set for autonomy-capable units only. */
      readonly autonomous?: boolean
    }
  | { readonly type: 'UNIT_FLEW'; readonly unitId: UnitId; readonly altitude: number }
  | {
      readonly type: 'UNIT_NAVIGATED'
      readonly unitId: UnitId
      readonly variant: 'WATER' | 'AMPHIBIOUS'
      /** Set for submersibles only. */
      readonly depth?: number
    }
  | { readonly type: 'UNIT_LOADED'; readonly unitId: UnitId; readonly variant: UnitVariant; readonly amount: number }
  | { readonly type: 'UNIT_UNLOADED'; readonly unitId: UnitId; readonly variant: UnitVariant; readonly amount: number }
  | { readonly type: 'AUTONOMY_ENABLED'; readonly unitId: UnitId; readonly variant: UnitVariant }
  | { readonly type: 'AUTONOMY_DISABLED'; readonly unitId: UnitId; readonly variant: UnitVariant }
  | { readonly type: 'AUTONOMY_ALWAYS_ON'; readonly unitId: UnitId }
  | { readonly type: 'AUTONOMY_REFUSED'; readonly unitId: UnitId }
  | { readonly type: 'MEDIUM_TOGGLED'; readonly unitId: UnitId; readonly inWater: boolean }
  | {
      readonly type: 'MISSION_STARTED'
      readonly missionId: MissionId
      readonly kind: MissionKind
      readonly origin: Location
      readonly destination: Location
    }
  | {
      readonly type: 'MISSION_EN_ROUTE'
      readonly missionId: MissionId
      readonly unitId: UnitId
      readonly destination: Location
    }
  | { readonly type: 'MISSION_COMPLETED'; readonly missionId: MissionId; readonly kind: MissionKind }
  | {
      readonly type: 'MISSION_STEP_FAILED'
      readonly missionId: MissionId
      readonly code: DomainErrorCode
      readonly message: string
    }
  | {
      readonly type: 'STATUS_REPORT'
      readonly cycle: number
      readonly units: readonly string[]
      readonly missions: readonly string[]
    }
  | { readonly type: 'CYCLE_COMPLETED'; readonly cycle: number }

export type SimulationEventType = SimulationEvent['type']

/** Receives every event the engine emits, synchronously and in order. */
export type EventSink = (event: SimulationEvent) => void

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Renders an event as the human-readable line shown to operators. */
export function formatEvent(event: SimulationEvent): string {
  switch (event.type) {
    case 'UNIT_ADDED':
      return `Unit ${event.unitId} (${UNIT_VARIANT_LABELS[event.variant]}) added to the fleet`
    case 'MISSION_ADDED':
      return `Mission ${event.missionId} (${MISSION_KIND_LABELS[event.kind]}) added to the queue`
    case 'CYCLE_STARTED':
      return `=== Cycle ${event.cycle} started ===`
    case 'UNIT_ASSIGNED':
      return `Unit ${event.unitId} assigned to mission ${event.missionId}`
    case 'DISPATCH_UNAVAILABLE':
      return `No unit available at ${event.origin} for mission ${event.missionId}`
    case 'UNIT_MOVING':
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} moving to ${event.destination}`
    case 'UNIT_DROVE': {
      const how =
        event.autonomous === undefined ? 'on land' : event.autonomous ? 'in autonomous mode' : 'manually'
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} driving ${how}`
    }
    case 'UNIT_FLEW':
      return `${UNIT_VARIANT_LABELS.AIR} ${event.unitId} flying at ${formatMetres(event.altitude)}`
    case 'UNIT_NAVIGATED':
      return event.depth === undefined
        ? `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} navigating on water`
        : `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} navigating at ${formatMetres(event.depth)} depth`
    case 'UNIT_LOADED':
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} loading ${formatKg(event.amount)}`
    case 'UNIT_UNLOADED':
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId} unloading ${formatKg(event.amount)}`
    case 'AUTONOMY_ENABLED':
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId}: autonomy enabled`
    case 'AUTONOMY_DISABLED':
      return `${UNIT_VARIANT_LABELS[event.variant]} ${event.unitId}: autonomy disabled`
    case 'AUTONOMY_ALWAYS_ON':
      return `${UNIT_VARIANT_LABELS.AIR} ${event.unitId}: autonomy is always on`
    case 'AUTONOMY_REFUSED':
      return `${UNIT_VARIANT_LABELS.AIR} ${event.unitId}: autonomy cannot be disabled`
    case 'MEDIUM_TOGGLED':
      return `${UNIT_VARIANT_LABELS.AMPHIBIOUS} ${event.unitId} switched to ${event.inWater ? 'water' : 'land'}`
    case 'MISSION_STARTED':
      return event.kind === 'RESCUE'
        ? `>>> Starting rescue mission ${event.missionId} at ${event.destination}`
        : `>>> Starting urgent delivery ${event.missionId} from ${event.origin} to ${event.destination}`
    case 'MISSION_EN_ROUTE':
      return `Unit ${event.unitId} en route to ${event.destination} for mission ${event.missionId}`
    case 'MISSION_COMPLETED':
      return `<<< ${MISSION_KIND_LABELS[event.kind]} ${event.missionId} completed`
    case 'MISSION_STEP_FAILED':
      return `Mission ${event.missionId} step failed [${event.code}]: ${event.message}`
    case 'STATUS_REPORT':
      return ['--- Unit status ---', ...event.units, '--- Mission status ---', ...event.missions].join('\n')
    case 'CYCLE_COMPLETED':
      return `=== Cycle ${event.cycle} completed ===`
  }
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export const consoleSink: EventSink = (event) => {
  console.log(formatEvent(event))
}

export const discardEvents: EventSink = () => {}

/** A sink that keeps every event in memory, in emission order. */
export function collectEvents(): { readonly sink: EventSink; readonly events: SimulationEvent[] } {
  const events: SimulationEvent[] = []
  return { sink: (event) => events.push(event), events }
}
