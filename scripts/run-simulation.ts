#!/usr/bin/env node
/**
 * Runs the demo fleet through the dispatch loop and prints every event.
 *
 * Usage:
 *   npx tsx scripts/run-simulation.ts [--cycles N] [--until-settled]
 *
 * Options:
 *   --cycles N        Number of cycles to run (default: 2)
 *   --until-settled   Stop early once every mission is complete
 */

import { parseArgs } from 'util'
import {
  Simulation,
  consoleSink,
  createMission,
  createUnit,
  type MissionKind,
  type MissionSpec,
  type UnitSpec,
  type UnitVariant,
} from '@fleetline/domain'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const GREEN = '\x1b[32m'
const RED = '\x1b[31m'
const YELLOW = '\x1b[33m'
const BOLD = '\x1b[1m'
const RESET = '\x1b[0m'

const ok = (msg: string) => console.log(`  ${GREEN}✓${RESET} ${msg}`)
const warn = (msg: string) => console.log(`  ${YELLOW}!${RESET} ${msg}`)
const step = (n: number, total: number, msg: string) =>
  console.log(`\n${BOLD}[STEP ${n}/${total}]${RESET} ${msg}`)

function parseCycles(raw: string | undefined): number {
  if (raw === undefined) return 2
  const cycles = Number(raw)
  if (!Number.isInteger(cycles) || cycles < 1) {
    throw new Error(`--cycles must be a positive integer, got "${raw}"`)
  }
  return cycles
}

// ---------------------------------------------------------------------------
// Demo fleet
// ---------------------------------------------------------------------------

const DEMO_UNITS: ReadonlyArray<[UnitVariant, UnitSpec]> = [
  ['GROUND', { id: 'AUTO-001', capacity: 500, location: 'Base Central' }],
  ['AIR', { id: 'DRON-001', capacity: 10, location: 'Hangar Norte' }],
  ['WATER', { id: 'SUB-001', capacity: 2000, location: 'Puerto Este' }],
  ['AMPHIBIOUS', { id: 'ANF-001', capacity: 800, location: 'Base Mixta' }],
]

const DEMO_MISSIONS: ReadonlyArray<[MissionKind, MissionSpec]> = [
  ['URGENT_DELIVERY', { id: 'M001', origin: 'Base Central', destination: 'Centro de Distribución', payload: 300 }],
  ['RESCUE', { id: 'M002', origin: 'Hangar Norte', destination: 'Zona de Desastre', payload: 0 }],
  ['URGENT_DELIVERY', { id: 'M003', origin: 'Puerto Este', destination: 'Isla Remota', payload: 1500 }],
  ['RESCUE', { id: 'M004', origin: 'Base Mixta', destination: 'Playa Accidentada', payload: 5 }],
]

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  const { values } = parseArgs({
    options: {
      cycles: { type: 'string' },
      'until-settled': { type: 'boolean', default: false },
    },
  })
  const cycles = parseCycles(values.cycles)
  const untilSettled = values['until-settled'] === true

  console.log(`
${BOLD}╔══════════════════════════════════════════════════╗
║     Fleetline · Dispatch Simulation              ║
╚══════════════════════════════════════════════════╝${RESET}
`)

  const TOTAL_STEPS = 3
  const sim = new Simulation({ sink: consoleSink })

  step(1, TOTAL_STEPS, 'Build fleet and mission queue')
  for (const [variant, spec] of DEMO_UNITS) sim.addUnit(createUnit(variant, spec))
  for (const [kind, spec] of DEMO_MISSIONS) sim.addMission(createMission(kind, spec))
  ok(`${sim.units.length} units, ${sim.missions.length} missions`)

  step(2, TOTAL_STEPS, `Run ${cycles} cycle(s)${untilSettled ? ', stopping once settled' : ''}`)
  const reports = sim.run(cycles, { untilSettled })

  step(3, TOTAL_STEPS, 'Summary')
  const failures = reports.flatMap((r) => r.failures)
  for (const f of failures) warn(`Cycle step failed for ${f.missionId} [${f.code}]: ${f.message}`)
  const completed = sim.missions.filter((m) => m.state === 'COMPLETED').length
  if (sim.isSettled()) {
    ok(`All ${completed} missions completed after ${sim.cycle} cycle(s)`)
  } else {
    warn(`${completed} of ${sim.missions.length} missions completed after ${sim.cycle} cycle(s)`)
  }
}

try {
  main()
} catch (err: unknown) {
  console.error(`\n${RED}Fatal error:${RESET}`, err instanceof Error ? err.message : err)
  process.exit(1)
}
