// ---------------------------------------------------------------------------
// Dispatch bounded context
// Matches pending missions to idle units standing at the mission's origin.
// ---------------------------------------------------------------------------

import type { EventSink } from '../events/index'
import type { Unit } from '../fleet/index'
import type { Mission, MissionId } from '../mission/index'
import { assignMission, isMissionActive } from '../mission/index'

/**
 * Returns true when the unit is held by an ASSIGNED or IN_PROGRESS mission
 * other than `exceptMissionId`. A unit whose back-reference names another
 * mission is busy even when that mission is not in `missions`.
 */
export function isUnitBusy(unit: Unit, missions: readonly Mission[], exceptMissionId?: MissionId): boolean {
  if (unit.currentMissionId !== undefined && unit.currentMissionId !== exceptMissionId) return true
  return missions.some((m) => m.id !== exceptMissionId && m.assignedUnitId === unit.id && isMissionActive(m))
}

/**
 * Returns true when the mission is waiting for a unit.
 *
 * @rule A COMPLETED mission is never dispatched again, whatever its unit field says.
 */
export function canDispatch(mission: Mission): boolean {
  return mission.state === 'PENDING' && mission.assignedUnitId === undefined
}

/**
 * First unit, in fleet order, that stands at the mission's origin and is not
 * busy with another mission. Greedy: no attempt is made to find a "better"
 * unit further down the list.
 */
export function findAvailableUnit(
  mission: Mission,
  fleet: readonly Unit[],
  missions: readonly Mission[],
): Unit | undefined {
  return fleet.find((unit) => unit.location === mission.origin && !isUnitBusy(unit, missions, mission.id))
}

/**
 * Assigns the first available unit to the mission.
 *
 * When nothing qualifies the mission stays PENDING, a DISPATCH_UNAVAILABLE
 * event is reported, and `undefined` is returned. The caller retries on the
 * next cycle.
 */
export function dispatchMission(
  mission: Mission,
  fleet: readonly Unit[],
  missions: readonly Mission[],
  sink: EventSink,
): Unit | undefined {
  if (!canDispatch(mission)) return undefined
  const unit = findAvailableUnit(mission, fleet, missions)
  if (unit === undefined) {
    sink({ type: 'DISPATCH_UNAVAILABLE', missionId: mission.id, origin: mission.origin })
    return undefined
  }
  assignMission(mission, unit, sink)
  return unit
}
