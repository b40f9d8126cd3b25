import { describe, it, expect } from 'vitest'
import {
  // shared
  ValidationError,
  CapacityExceededError,
  IllegalStateError,
  isDomainError,
  formatKg,
  formatMetres,
  // events
  collectEvents,
  discardEvents,
  formatEvent,
  // fleet
  createUnit,
  moveUnit,
  loadUnit,
  unloadUnit,
  enableAutonomy,
  disableAutonomy,
  toggleMedium,
  describeUnit,
  toUnitStatus,
  capabilitiesOf,
  hasCapability,
  isAutonomyCapable,
  toUnitId,
  CRUISE_ALTITUDE,
  OPERATING_DEPTH,
  type Unit,
  type UnitSpec,
  type UnitVariant,
  // mission
  createMission,
  assignMission,
  startMission,
  completeMission,
  stepMission,
  describeMission,
  toMissionId,
  type Mission,
  type MissionKind,
  type MissionSpec,
  // dispatch
  canDispatch,
  isUnitBusy,
  findAvailableUnit,
  dispatchMission,
} from '../index'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeUnit(variant: UnitVariant = 'GROUND', overrides: Partial<UnitSpec> = {}): Unit {
  return createUnit(variant, { id: 'AUTO-001', capacity: 500, location: 'Base Central', ...overrides })
}

function makeMission(kind: MissionKind = 'URGENT_DELIVERY', overrides: Partial<MissionSpec> = {}): Mission {
  return createMission(kind, {
    id: 'M001',
    origin: 'Base Central',
    destination: 'Centro de Distribución',
    payload: 300,
    ...overrides,
  })
}

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

// ---------------------------------------------------------------------------
// 1. Formatting helpers
// ---------------------------------------------------------------------------
describe('formatKg / formatMetres', () => {
  it('renders weights with two decimals', () => {
    expect(formatKg(500)).toBe('500.00 kg')
  })

  it('renders distances with one decimal', () => {
    expect(formatMetres(50)).toBe('50.0 m')
  })
})

// ---------------------------------------------------------------------------
// 2. Unit construction: validated before any field is written
// ---------------------------------------------------------------------------
describe('createUnit', () => {
  it('accepts a ground unit with id AUTO-001 and capacity 500', () => {
    const unit = makeUnit()
    expect(unit.id).toBe('AUTO-001')
    expect(unit.capacity).toBe(500)
    expect(unit.location).toBe('Base Central')
  })

  it('rejects an empty id', () => {
    expect(() => makeUnit('GROUND', { id: '' })).toThrow(ValidationError)
  })

  it('rejects a whitespace-only id', () => {
    expect(() => makeUnit('AIR', { id: '   ' })).toThrow(ValidationError)
  })

  it('rejects a capacity of zero', () => {
    expect(() => makeUnit('GROUND', { capacity: 0 })).toThrow(ValidationError)
  })

  it('rejects a negative capacity', () => {
    expect(() => makeUnit('WATER', { capacity: -10 })).toThrow('Unit capacity must be a positive number')
  })

  it('rejects a blank location', () => {
    expect(() => makeUnit('AMPHIBIOUS', { location: ' ' })).toThrow('Unit location must not be empty')
  })

  it('lists every violated rule', () => {
    const err = captureError(() => makeUnit('GROUND', { id: '', capacity: 0 }))
    expect(err).toBeInstanceOf(ValidationError)
    expect(err).toMatchObject({
      code: 'VALIDATION_ERROR',
      issues: ['Unit id must not be empty', 'Unit capacity must be a positive number'],
    })
  })

  it('starts ground units with autonomy disabled', () => {
    const unit = makeUnit('GROUND')
    expect(toUnitStatus(unit).autonomyEnabled).toBe(false)
  })

  it('starts air units with autonomy enabled and at zero altitude', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10 })
    expect(toUnitStatus(unit)).toMatchObject({ autonomyEnabled: true, altitude: 0 })
  })

  it('starts amphibious units on land', () => {
    expect(toUnitStatus(makeUnit('AMPHIBIOUS'))).toMatchObject({ inWater: false })
  })
})

// ---------------------------------------------------------------------------
// 3. Capabilities: fixed by variant
// ---------------------------------------------------------------------------
describe('capabilities', () => {
  it('maps each variant to its capability set', () => {
    expect(capabilitiesOf(makeUnit('GROUND'))).toEqual(['GROUND', 'AUTONOMY'])
    expect(capabilitiesOf(makeUnit('AIR'))).toEqual(['AIR', 'AUTONOMY'])
    expect(capabilitiesOf(makeUnit('WATER'))).toEqual(['WATER'])
    expect(capabilitiesOf(makeUnit('AMPHIBIOUS'))).toEqual(['GROUND', 'WATER'])
  })

  it('answers capability queries', () => {
    expect(hasCapability(makeUnit('AMPHIBIOUS'), 'WATER')).toBe(true)
    expect(hasCapability(makeUnit('AMPHIBIOUS'), 'AIR')).toBe(false)
  })

  it('treats only ground and air units as autonomy-capable', () => {
    expect(isAutonomyCapable(makeUnit('GROUND'))).toBe(true)
    expect(isAutonomyCapable(makeUnit('AIR'))).toBe(true)
    expect(isAutonomyCapable(makeUnit('WATER'))).toBe(false)
    expect(isAutonomyCapable(makeUnit('AMPHIBIOUS'))).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// 4. Movement
// ---------------------------------------------------------------------------
describe('moveUnit', () => {
  it('drives a ground unit and updates its location', () => {
    const unit = makeUnit('GROUND')
    const { sink, events } = collectEvents()
    moveUnit(unit, 'Depot', sink)
    expect(unit.location).toBe('Depot')
    expect(events).toEqual([
      { type: 'UNIT_MOVING', unitId: 'AUTO-001', variant: 'GROUND', destination: 'Depot' },
      { type: 'UNIT_DROVE', unitId: 'AUTO-001', variant: 'GROUND', autonomous: false },
    ])
  })

  it('flies an air unit at cruise altitude', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10, location: 'Hangar Norte' })
    moveUnit(unit, 'Zona de Desastre', discardEvents)
    expect(toUnitStatus(unit).altitude).toBe(CRUISE_ALTITUDE)
    expect(unit.location).toBe('Zona de Desastre')
  })

  it('dives a water unit to operating depth', () => {
    const unit = makeUnit('WATER', { id: 'SUB-001', capacity: 2000, location: 'Puerto Este' })
    moveUnit(unit, 'Isla Remota', discardEvents)
    expect(toUnitStatus(unit).depth).toBe(OPERATING_DEPTH)
  })

  it('drives an amphibious unit that is on land', () => {
    const unit = makeUnit('AMPHIBIOUS', { id: 'ANF-001' })
    const { sink, events } = collectEvents()
    moveUnit(unit, 'Playa', sink)
    expect(events[1]).toEqual({ type: 'UNIT_DROVE', unitId: 'ANF-001', variant: 'AMPHIBIOUS' })
    expect(toUnitStatus(unit).inWater).toBe(false)
  })

  it('navigates an amphibious unit that is in the water', () => {
    const unit = makeUnit('AMPHIBIOUS', { id: 'ANF-001' })
    toggleMedium(unit, discardEvents)
    const { sink, events } = collectEvents()
    moveUnit(unit, 'Isla', sink)
    expect(events[1]).toEqual({ type: 'UNIT_NAVIGATED', unitId: 'ANF-001', variant: 'AMPHIBIOUS' })
    expect(toUnitStatus(unit).inWater).toBe(true)
    expect(unit.location).toBe('Isla')
  })
})

// ---------------------------------------------------------------------------
// 5. Cargo: capacity check on load only
// ---------------------------------------------------------------------------
describe('loadUnit / unloadUnit', () => {
  it('rejects a load of 600 on a unit with capacity 500', () => {
    expect(() => loadUnit(makeUnit(), 600, discardEvents)).toThrow(CapacityExceededError)
  })

  it('carries the unit, capacity and amount on the error', () => {
    const err = captureError(() => loadUnit(makeUnit(), 600, discardEvents))
    expect(err).toMatchObject({ code: 'CAPACITY_EXCEEDED', unitId: 'AUTO-001', capacity: 500, amount: 600 })
    expect(isDomainError(err)).toBe(true)
  })

  it('accepts a load of 300 on the same unit', () => {
    const { sink, events } = collectEvents()
    loadUnit(makeUnit(), 300, sink)
    expect(events).toEqual([{ type: 'UNIT_LOADED', unitId: 'AUTO-001', variant: 'GROUND', amount: 300 }])
  })

  it('accepts a load equal to capacity', () => {
    expect(() => loadUnit(makeUnit(), 500, discardEvents)).not.toThrow()
  })

  it('unloads any amount without an underflow check', () => {
    const { sink, events } = collectEvents()
    unloadUnit(makeUnit(), 9000, sink)
    expect(events).toEqual([{ type: 'UNIT_UNLOADED', unitId: 'AUTO-001', variant: 'GROUND', amount: 9000 }])
  })
})

// ---------------------------------------------------------------------------
// 6. Autonomy and medium
// ---------------------------------------------------------------------------
describe('autonomy toggles', () => {
  it('enables and disables autonomy on a ground unit', () => {
    const unit = makeUnit('GROUND')
    enableAutonomy(unit, discardEvents)
    expect(toUnitStatus(unit).autonomyEnabled).toBe(true)
    disableAutonomy(unit, discardEvents)
    expect(toUnitStatus(unit).autonomyEnabled).toBe(false)
  })

  it('refuses to disable autonomy on an air unit without throwing', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10 })
    const { sink, events } = collectEvents()
    expect(() => disableAutonomy(unit, sink)).not.toThrow()
    expect(toUnitStatus(unit).autonomyEnabled).toBe(true)
    expect(events).toEqual([{ type: 'AUTONOMY_REFUSED', unitId: 'DRON-001' }])
  })

  it('reports that air autonomy is always on when enabling', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10 })
    const { sink, events } = collectEvents()
    enableAutonomy(unit, sink)
    expect(events).toEqual([{ type: 'AUTONOMY_ALWAYS_ON', unitId: 'DRON-001' }])
  })

  it('rejects autonomy toggles on a unit without the capability', () => {
    expect(() => enableAutonomy(makeUnit('WATER'), discardEvents)).toThrow(IllegalStateError)
  })

  it('drives in autonomous mode once enabled', () => {
    const unit = makeUnit('GROUND')
    enableAutonomy(unit, discardEvents)
    const { sink, events } = collectEvents()
    moveUnit(unit, 'Depot', sink)
    expect(events.map(formatEvent)).toEqual(['Car AUTO-001 moving to Depot', 'Car AUTO-001 driving in autonomous mode'])
  })
})

describe('toggleMedium', () => {
  it('flips an amphibious unit between land and water', () => {
    const unit = makeUnit('AMPHIBIOUS', { id: 'ANF-001' })
    const { sink, events } = collectEvents()
    toggleMedium(unit, sink)
    toggleMedium(unit, sink)
    expect(events).toEqual([
      { type: 'MEDIUM_TOGGLED', unitId: 'ANF-001', inWater: true },
      { type: 'MEDIUM_TOGGLED', unitId: 'ANF-001', inWater: false },
    ])
  })

  it('rejects units that are not amphibious', () => {
    expect(() => toggleMedium(makeUnit('GROUND'), discardEvents)).toThrow('cannot change medium')
  })
})

// ---------------------------------------------------------------------------
// 7. Status strings
// ---------------------------------------------------------------------------
describe('describeUnit', () => {
  it('describes a ground unit', () => {
    expect(describeUnit(makeUnit())).toBe(
      'Car ID: AUTO-001, Capacity: 500.00 kg, Location: Base Central, Autonomy: Disabled',
    )
  })

  it('describes an air unit after it has flown', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10, location: 'Hangar Norte' })
    moveUnit(unit, 'Zona de Desastre', discardEvents)
    expect(describeUnit(unit)).toBe(
      'Drone ID: DRON-001, Capacity: 10.00 kg, Location: Zona de Desastre, Altitude: 100.0 m',
    )
  })

  it('describes a water unit before it has dived', () => {
    const unit = makeUnit('WATER', { id: 'SUB-001', capacity: 2000, location: 'Puerto Este' })
    expect(describeUnit(unit)).toBe('Submarine ID: SUB-001, Capacity: 2000.00 kg, Location: Puerto Este, Depth: 0.0 m')
  })

  it('describes an amphibious unit by its medium', () => {
    const unit = makeUnit('AMPHIBIOUS', { id: 'ANF-001', capacity: 800, location: 'Base Mixta' })
    expect(describeUnit(unit)).toBe('Amphibian ID: ANF-001, Capacity: 800.00 kg, Location: Base Mixta, Mode: Land')
  })
})

// ---------------------------------------------------------------------------
// 8. Mission construction and lifecycle
// ---------------------------------------------------------------------------
describe('createMission', () => {
  it('creates a PENDING, unassigned mission', () => {
    const mission = makeMission()
    expect(mission.state).toBe('PENDING')
    expect(mission.assignedUnitId).toBeUndefined()
  })

  it('accepts a zero payload', () => {
    expect(makeMission('RESCUE', { payload: 0 }).payload).toBe(0)
  })

  it('rejects a negative payload', () => {
    expect(() => makeMission('RESCUE', { payload: -1 })).toThrow(ValidationError)
  })

  it('rejects a blank origin', () => {
    expect(() => makeMission('URGENT_DELIVERY', { origin: ' ' })).toThrow('Mission origin must not be empty')
  })
})

describe('assignMission', () => {
  it('links the mission and the unit in both directions', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    expect(mission.state).toBe('ASSIGNED')
    expect(mission.assignedUnitId).toBe('AUTO-001')
    expect(unit.currentMissionId).toBe('M001')
  })

  it('refuses to assign a mission that is not PENDING', () => {
    const mission = makeMission()
    assignMission(mission, makeUnit(), discardEvents)
    expect(() => assignMission(mission, makeUnit(), discardEvents)).toThrow(IllegalStateError)
  })
})

describe('startMission', () => {
  it('throws IllegalStateError when no unit is assigned', () => {
    const mission = makeMission()
    expect(() => startMission(mission, undefined, discardEvents)).toThrow(IllegalStateError)
    expect(mission.state).toBe('PENDING')
  })

  it('moves the unit to the destination for an urgent delivery', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    expect(mission.state).toBe('IN_PROGRESS')
    expect(unit.location).toBe('Centro de Distribución')
  })

  it('enables autonomy on an autonomy-capable rescuer', () => {
    const unit = makeUnit()
    const mission = makeMission('RESCUE', { payload: 5 })
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    expect(toUnitStatus(unit).autonomyEnabled).toBe(true)
  })

  it('refuses a unit other than the assigned one and moves nothing', () => {
    const assigned = makeUnit('GROUND', { id: 'U-A', location: 'X' })
    const stranger = makeUnit('GROUND', { id: 'U-B', location: 'Q' })
    const mission = makeMission('URGENT_DELIVERY', { origin: 'X', destination: 'Y' })
    assignMission(mission, assigned, discardEvents)
    expect(() => startMission(mission, stranger, discardEvents)).toThrow(
      'Unit U-B is not assigned to mission M001',
    )
    expect(mission.state).toBe('ASSIGNED')
    expect(assigned.location).toBe('X')
    expect(stranger.location).toBe('Q')
  })
})

describe('completeMission', () => {
  it('unloads the payload and releases the unit for an urgent delivery', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    const { sink, events } = collectEvents()
    completeMission(mission, unit, sink)
    expect(mission.state).toBe('COMPLETED')
    expect(unit.currentMissionId).toBeUndefined()
    expect(mission.assignedUnitId).toBe('AUTO-001')
    expect(events).toEqual([
      { type: 'UNIT_UNLOADED', unitId: 'AUTO-001', variant: 'GROUND', amount: 300 },
      { type: 'MISSION_COMPLETED', missionId: 'M001', kind: 'URGENT_DELIVERY' },
    ])
  })

  it('loads the rescued payload, then disables autonomy', () => {
    const unit = makeUnit()
    const mission = makeMission('RESCUE', { payload: 5 })
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    const { sink, events } = collectEvents()
    completeMission(mission, unit, sink)
    expect(events.map((e) => e.type)).toEqual(['UNIT_LOADED', 'AUTONOMY_DISABLED', 'MISSION_COMPLETED'])
    expect(toUnitStatus(unit).autonomyEnabled).toBe(false)
  })

  it('leaves the mission IN_PROGRESS when the rescue load exceeds capacity', () => {
    const unit = makeUnit('AIR', { id: 'DRON-001', capacity: 10 })
    const mission = makeMission('RESCUE', { payload: 20 })
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    expect(() => completeMission(mission, unit, discardEvents)).toThrow(CapacityExceededError)
    expect(mission.state).toBe('IN_PROGRESS')
    expect(unit.currentMissionId).toBe('M001')
  })

  it('refuses a unit other than the assigned one', () => {
    const unit = makeUnit()
    const stranger = makeUnit('GROUND', { id: 'AUTO-002' })
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    startMission(mission, unit, discardEvents)
    const { sink, events } = collectEvents()
    expect(() => completeMission(mission, stranger, sink)).toThrow(IllegalStateError)
    expect(mission.state).toBe('IN_PROGRESS')
    expect(events).toEqual([])
  })
})

describe('stepMission', () => {
  it('starts an ASSIGNED mission whose unit is at the origin', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    expect(stepMission(mission, unit, discardEvents)).toBe('STARTED')
  })

  it('completes an IN_PROGRESS mission whose unit is at the destination', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    stepMission(mission, unit, discardEvents)
    expect(stepMission(mission, unit, discardEvents)).toBe('COMPLETED')
  })

  it('reports en route when the unit is elsewhere', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    moveUnit(unit, 'Somewhere Else', discardEvents)
    const { sink, events } = collectEvents()
    expect(stepMission(mission, unit, sink)).toBe('EN_ROUTE')
    expect(mission.state).toBe('ASSIGNED')
    expect(events.map(formatEvent)).toEqual(['Unit AUTO-001 en route to Centro de Distribución for mission M001'])
  })

  it('treats COMPLETED as absorbing', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    stepMission(mission, unit, discardEvents)
    stepMission(mission, unit, discardEvents)
    expect(stepMission(mission, unit, discardEvents)).toBe('IDLE')
    expect(mission.state).toBe('COMPLETED')
  })

  it('refuses to step with a unit other than the assigned one', () => {
    const unit = makeUnit()
    const stranger = makeUnit('GROUND', { id: 'AUTO-002' })
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    expect(() => stepMission(mission, stranger, discardEvents)).toThrow(
      'Unit AUTO-002 is not assigned to mission M001',
    )
    expect(mission.state).toBe('ASSIGNED')
  })
})

describe('describeMission', () => {
  it('describes a pending mission', () => {
    expect(describeMission(makeMission())).toBe(
      'Mission ID: M001 (Urgent delivery), Origin: Base Central, Destination: Centro de Distribución, ' +
        'Payload: 300.00 kg, State: Pending, Unit: none',
    )
  })
})

// ---------------------------------------------------------------------------
// 9. Dispatch
// ---------------------------------------------------------------------------
describe('findAvailableUnit: first idle unit at the origin wins', () => {
  it('picks the unit standing at the origin, never one elsewhere', () => {
    const u1 = makeUnit('GROUND', { id: 'U1', location: 'X' })
    const u2 = makeUnit('GROUND', { id: 'U2', location: 'Y' })
    const mission = makeMission('URGENT_DELIVERY', { origin: 'Y' })
    expect(findAvailableUnit(mission, [u1, u2], [mission])?.id).toBe('U2')
  })

  it('breaks ties by fleet order', () => {
    const u1 = makeUnit('GROUND', { id: 'U1', location: 'X' })
    const u2 = makeUnit('AIR', { id: 'U2', location: 'X' })
    const mission = makeMission('URGENT_DELIVERY', { origin: 'X' })
    expect(findAvailableUnit(mission, [u1, u2], [mission])?.id).toBe('U1')
  })

  it('skips a unit that is busy with another active mission', () => {
    const u1 = makeUnit('GROUND', { id: 'U1', location: 'X' })
    const u2 = makeUnit('GROUND', { id: 'U2', location: 'X' })
    const held = makeMission('URGENT_DELIVERY', { id: 'M-held', origin: 'X' })
    assignMission(held, u1, discardEvents)
    const waiting = makeMission('URGENT_DELIVERY', { id: 'M-wait', origin: 'X' })
    expect(findAvailableUnit(waiting, [u1, u2], [held, waiting])?.id).toBe('U2')
  })

  it('returns undefined when nothing stands at the origin', () => {
    const mission = makeMission('URGENT_DELIVERY', { origin: 'Nowhere' })
    expect(findAvailableUnit(mission, [makeUnit()], [mission])).toBeUndefined()
  })
})

describe('isUnitBusy', () => {
  it('ignores completed missions', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    stepMission(mission, unit, discardEvents)
    stepMission(mission, unit, discardEvents)
    expect(isUnitBusy(unit, [mission])).toBe(false)
  })

  it('ignores the excepted mission', () => {
    const unit = makeUnit()
    const mission = makeMission()
    assignMission(mission, unit, discardEvents)
    expect(isUnitBusy(unit, [mission], toMissionId('M001'))).toBe(false)
    expect(isUnitBusy(unit, [mission])).toBe(true)
  })

  it('counts a mission held outside the given list', () => {
    const unit = makeUnit()
    assignMission(makeMission(), unit, discardEvents)
    expect(isUnitBusy(unit, [])).toBe(true)
  })
})

describe('canDispatch', () => {
  it('accepts a PENDING mission', () => {
    expect(canDispatch(makeMission())).toBe(true)
  })

  it('never accepts a COMPLETED mission', () => {
    const mission = makeMission()
    mission.state = 'COMPLETED'
    expect(canDispatch(mission)).toBe(false)
  })
})

describe('dispatchMission', () => {
  it('assigns the chosen unit', () => {
    const unit = makeUnit()
    const mission = makeMission()
    const { sink, events } = collectEvents()
    expect(dispatchMission(mission, [unit], [mission], sink)).toBe(unit)
    expect(events).toEqual([{ type: 'UNIT_ASSIGNED', unitId: toUnitId('AUTO-001'), missionId: 'M001' }])
  })

  it('reports DISPATCH_UNAVAILABLE and leaves the mission PENDING', () => {
    const mission = makeMission('RESCUE', { id: 'M002', origin: 'Hangar Norte' })
    const { sink, events } = collectEvents()
    expect(dispatchMission(mission, [makeUnit()], [mission], sink)).toBeUndefined()
    expect(mission.state).toBe('PENDING')
    expect(events.map(formatEvent)).toEqual(['No unit available at Hangar Norte for mission M002'])
  })
})
