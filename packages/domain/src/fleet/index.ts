// ---------------------------------------------------------------------------
// Fleet bounded context
// Transport units, their locomotion capabilities and their physical state.
// ---------------------------------------------------------------------------

import type { Brand, Location } from '../shared/types'
import { formatKg, formatMetres, isNonBlank } from '../shared/types'
import { CapacityExceededError, IllegalStateError, ValidationError } from '../shared/errors'
import type { EventSink } from '../events/index'
import type { MissionId } from '../mission/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a Unit within a simulation. */
export type UnitId = Brand<string, 'UnitId'>

export const toUnitId = (raw: string): UnitId => raw as UnitId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/** The concrete kind of transport. Fixed at creation. */
export type UnitVariant = 'GROUND' | 'AIR' | 'WATER' | 'AMPHIBIOUS'

export const UNIT_VARIANTS: readonly UnitVariant[] = ['GROUND', 'AIR', 'WATER', 'AMPHIBIOUS'] as const

/** A named behaviour set a variant possesses. */
export type Capability = 'GROUND' | 'AIR' | 'WATER' | 'AUTONOMY'

export const UNIT_CAPABILITIES: Record<UnitVariant, readonly Capability[]> = {
  GROUND: ['GROUND', 'AUTONOMY'],
  AIR: ['AIR', 'AUTONOMY'],
  WATER: ['WATER'],
  AMPHIBIOUS: ['GROUND', 'WATER'],
}

export const UNIT_VARIANT_LABELS: Record<UnitVariant, string> = {
  GROUND: 'Car',
  AIR: 'Drone',
  WATER: 'Submarine',
  AMPHIBIOUS: 'Amphibian',
}

/** Altitude an air unit climbs to whenever it flies. */
export const CRUISE_ALTITUDE = 100

/** Depth a water unit dives to whenever it navigates. */
export const OPERATING_DEPTH = 50

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

interface UnitBase {
  readonly id: UnitId
  /** Maximum payload weight, in kilograms. */
  readonly capacity: number
  location: Location
  /**
   * Non-owning back-reference to the mission this unit is currently serving.
   * The simulation's mission queue owns the mission itself.
   */
  currentMissionId?: MissionId | undefined
}

export interface GroundUnit extends UnitBase {
  readonly variant: 'GROUND'
  autonomyEnabled: boolean
}

/**
 * @invariant `autonomyEnabled` is always true: air units run under a fixed
 *            autonomy policy and refuse to switch it off.
 */
export interface AirUnit extends UnitBase {
  readonly variant: 'AIR'
  readonly autonomyEnabled: true
  altitude: number
}

export interface WaterUnit extends UnitBase {
  readonly variant: 'WATER'
  depth: number
}

export interface AmphibiousUnit extends UnitBase {
  readonly variant: 'AMPHIBIOUS'
  /** Current medium. Chooses between driving and navigating on the next move. */
  inWater: boolean
}

/**
 * A transport unit. Behaviour is dispatched on `variant`.
 *
 * @invariant `id` is non-blank and `capacity` is strictly positive.
 * @invariant `location` changes only through `moveUnit`.
 */
export type Unit = GroundUnit | AirUnit | WaterUnit | AmphibiousUnit

export type AutonomousUnit = GroundUnit | AirUnit

export interface UnitSpec {
  readonly id: string
  readonly capacity: number
  readonly location: Location
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** Returns the rule violations for a unit spec. An empty array means it is valid. */
export function validateUnitSpec(spec: UnitSpec): readonly string[] {
  const errors: string[] = []
  if (!isNonBlank(spec.id)) errors.push('Unit id must not be empty')
  if (!Number.isFinite(spec.capacity) || spec.capacity <= 0) {
    errors.push('Unit capacity must be a positive number')
  }
  if (!isNonBlank(spec.location)) errors.push('Unit location must not be empty')
  return errors
}

/**
 * Builds a unit of the given variant.
 *
 * @throws {ValidationError} if the id is blank or the capacity is not positive.
 */
export function createUnit(variant: UnitVariant, spec: UnitSpec): Unit {
  const errors = validateUnitSpec(spec)
  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), errors)
  }
  const base = { id: toUnitId(spec.id), capacity: spec.capacity, location: spec.location }
  switch (variant) {
    case 'GROUND':
      return { ...base, variant, autonomyEnabled: false }
    case 'AIR':
      return { ...base, variant, autonomyEnabled: true, altitude: 0 }
    case 'WATER':
      return { ...base, variant, depth: 0 }
    case 'AMPHIBIOUS':
      return { ...base, variant, inWater: false }
  }
}

// ---------------------------------------------------------------------------
// Capability queries
// ---------------------------------------------------------------------------

export function capabilitiesOf(unit: Unit): readonly Capability[] {
  return UNIT_CAPABILITIES[unit.variant]
}

export function hasCapability(unit: Unit, capability: Capability): boolean {
  return capabilitiesOf(unit).includes(capability)
}

export function isAutonomyCapable(unit: Unit): unit is AutonomousUnit {
  return unit.variant === 'GROUND' || unit.variant === 'AIR'
}

// ---------------------------------------------------------------------------
// Locomotion
// ---------------------------------------------------------------------------

function drive(unit: GroundUnit | AmphibiousUnit, sink: EventSink): void {
  if (unit.variant === 'AMPHIBIOUS') {
    unit.inWater = false
    sink({ type: 'UNIT_DROVE', unitId: unit.id, variant: unit.variant })
    return
  }
  sink({ type: 'UNIT_DROVE', unitId: unit.id, variant: unit.variant, autonomous: unit.autonomyEnabled })
}

function fly(unit: AirUnit, sink: EventSink): void {
  unit.altitude = CRUISE_ALTITUDE
  sink({ type: 'UNIT_FLEW', unitId: unit.id, altitude: unit.altitude })
}

function navigate(unit: WaterUnit | AmphibiousUnit, sink: EventSink): void {
  if (unit.variant === 'AMPHIBIOUS') {
    unit.inWater = true
    sink({ type: 'UNIT_NAVIGATED', unitId: unit.id, variant: unit.variant })
    return
  }
  unit.depth = OPERATING_DEPTH
  sink({ type: 'UNIT_NAVIGATED', unitId: unit.id, variant: unit.variant, depth: unit.depth })
}

/**
 * Teleports the unit to `destination` after running its locomotion action.
 * Amphibious units drive or navigate depending on their current medium.
 */
export function moveUnit(unit: Unit, destination: Location, sink: EventSink): void {
  sink({ type: 'UNIT_MOVING', unitId: unit.id, variant: unit.variant, destination })
  switch (unit.variant) {
    case 'GROUND':
      drive(unit, sink)
      break
    case 'AIR':
      fly(unit, sink)
      break
    case 'WATER':
      navigate(unit, sink)
      break
    case 'AMPHIBIOUS':
      if (unit.inWater) navigate(unit, sink)
      else drive(unit, sink)
      break
  }
  unit.location = destination
}

// ---------------------------------------------------------------------------
// Cargo
// ---------------------------------------------------------------------------

/**
 * Records a load onto the unit.
 *
 * @throws {CapacityExceededError} if `amount` is above the unit's capacity.
 */
export function loadUnit(unit: Unit, amount: number, sink: EventSink): void {
  if (amount > unit.capacity) {
    throw new CapacityExceededError(unit.id, unit.capacity, amount)
  }
  sink({ type: 'UNIT_LOADED', unitId: unit.id, variant: unit.variant, amount })
}

/** Records an unload. Loaded weight is not tracked, so there is no underflow check. */
export function unloadUnit(unit: Unit, amount: number, sink: EventSink): void {
  sink({ type: 'UNIT_UNLOADED', unitId: unit.id, variant: unit.variant, amount })
}

// ---------------------------------------------------------------------------
// Autonomy and medium
// ---------------------------------------------------------------------------

function requireAutonomy(unit: Unit): AutonomousUnit {
  if (!isAutonomyCapable(unit)) {
    throw new IllegalStateError(`Unit ${unit.id} (${UNIT_VARIANT_LABELS[unit.variant]}) has no autonomy capability`)
  }
  return unit
}

/** @throws {IllegalStateError} if the unit is not autonomy-capable. */
export function enableAutonomy(unit: Unit, sink: EventSink): void {
  const target = requireAutonomy(unit)
  if (target.variant === 'AIR') {
    sink({ type: 'AUTONOMY_ALWAYS_ON', unitId: target.id })
    return
  }
  target.autonomyEnabled = true
  sink({ type: 'AUTONOMY_ENABLED', unitId: target.id, variant: target.variant })
}

/**
 * Switches autonomy off. Air units refuse: the call is reported and the
 * flag stays on.
 *
 * @throws {IllegalStateError} if the unit is not autonomy-capable.
 */
export function disableAutonomy(unit: Unit, sink: EventSink): void {
  const target = requireAutonomy(unit)
  if (target.variant === 'AIR') {
    sink({ type: 'AUTONOMY_REFUSED', unitId: target.id })
    return
  }
  target.autonomyEnabled = false
  sink({ type: 'AUTONOMY_DISABLED', unitId: target.id, variant: target.variant })
}

/** @throws {IllegalStateError} if the unit is not amphibious. */
export function toggleMedium(unit: Unit, sink: EventSink): void {
  if (unit.variant !== 'AMPHIBIOUS') {
    throw new IllegalStateError(`Unit ${unit.id} (${UNIT_VARIANT_LABELS[unit.variant]}) cannot change medium`)
  }
  unit.inWater = !unit.inWater
  sink({ type: 'MEDIUM_TOGGLED', unitId: unit.id, inWater: unit.inWater })
}

// ---------------------------------------------------------------------------
// Read model
// ---------------------------------------------------------------------------

function describeVariant(unit: Unit): string {
  switch (unit.variant) {
    case 'GROUND':
      return `Autonomy: ${unit.autonomyEnabled ? 'Enabled' : 'Disabled'}`
    case 'AIR':
      return `Altitude: ${formatMetres(unit.altitude)}`
    case 'WATER':
      return `Depth: ${formatMetres(unit.depth)}`
    case 'AMPHIBIOUS':
      return `Mode: ${unit.inWater ? 'Water' : 'Land'}`
  }
}

/** One-line status of a unit. Pure read. */
export function describeUnit(unit: Unit): string {
  return (
    `${UNIT_VARIANT_LABELS[unit.variant]} ID: ${unit.id}, Capacity: ${formatKg(unit.capacity)}, ` +
    `Location: ${unit.location}, ${describeVariant(unit)}`
  )
}

/** Structured status of a unit, as exposed by simulation snapshots. */
export interface UnitStatus {
  readonly id: UnitId
  readonly variant: UnitVariant
  readonly capabilities: readonly Capability[]
  readonly capacity: number
  readonly location: Location
  readonly autonomyEnabled?: boolean
  readonly altitude?: number
  readonly depth?: number
  readonly inWater?: boolean
  readonly currentMissionId?: MissionId
  readonly status: string
}

export function toUnitStatus(unit: Unit): UnitStatus {
  const base = {
    id: unit.id,
    variant: unit.variant,
    capabilities: capabilitiesOf(unit),
    capacity: unit.capacity,
    location: unit.location,
    status: describeUnit(unit),
    ...(unit.currentMissionId !== undefined ? { currentMissionId: unit.currentMissionId } : {}),
  }
  switch (unit.variant) {
    case 'GROUND':
      return { ...base, autonomyEnabled: unit.autonomyEnabled }
    case 'AIR':
      return { ...base, autonomyEnabled: unit.autonomyEnabled, altitude: unit.altitude }
    case 'WATER':
      return { ...base, depth: unit.depth }
    case 'AMPHIBIOUS':
      return { ...base, inWater: unit.inWater }
  }
}
