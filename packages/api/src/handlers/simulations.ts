// ---------------------------------------------------------------------------
// Simulation handler: lifecycle, cycles and the event log
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import {
  createSimulation,
  deleteSimulation,
  findSimulationById,
  listEvents,
  listSimulations,
  runCycles,
} from '../repositories'
import { MissionBody, UnitBody } from './fleet'

const CreateSimulationBody = z.object({
  name: z.string().min(1).optional(),
  units: z.array(UnitBody).optional(),
  missions: z.array(MissionBody).optional(),
})

const ListQuery = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .default(50)
    .transform((v) => Math.min(v, 100)),
  offset: z.coerce.number().int().min(0).default(0),
})

const EventsQuery = z.object({
  limit: z.coerce.number().int().min(1).default(100),
})

const RunCyclesBody = z.object({
  count: z.number().int().min(1).optional(),
  untilSettled: z.boolean().optional(),
})

export const simulationsHandler = new Hono<AppEnv>()

simulationsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateSimulationBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    const store = c.get('store')
    try {
      const body = c.req.valid('json')
      const data = createSimulation(store, {
        ...(body.name !== undefined ? { name: body.name } : {}),
        ...(body.units !== undefined ? { units: body.units } : {}),
        ...(body.missions !== undefined ? { missions: body.missions } : {}),
      })
      return c.json({ data }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

simulationsHandler.get(
  '/',
  validator('query', (value, c) => {
    const r = ListQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    const { limit, offset } = c.req.valid('query')
    const data = listSimulations(c.get('store'), { limit, offset })
    return c.json({ data, meta: { count: data.length, limit, offset } })
  },
)

simulationsHandler.get('/:id', (c) => {
  const data = findSimulationById(c.get('store'), c.req.param('id'))
  if (!data) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

simulationsHandler.delete('/:id', (c) => {
  const deleted = deleteSimulation(c.get('store'), c.req.param('id'))
  if (!deleted) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
  return c.body(null, 204)
})

/**
 * Runs `count` cycles, stopping early once every mission is complete when
 * `untilSettled` is set. Without a count, one cycle runs, or up to the
 * per-request maximum when `untilSettled` is set.
 */
simulationsHandler.post(
  '/:id/cycles',
  validator('json', (value, c) => {
    const r = RunCyclesBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    const { maxCyclesPerRequest } = c.get('config')
    const body = c.req.valid('json')
    const untilSettled = body.untilSettled ?? false
    const count = body.count ?? (untilSettled ? maxCyclesPerRequest : 1)
    if (count > maxCyclesPerRequest) {
      return c.json(
        { error: `count must not exceed ${maxCyclesPerRequest}`, code: 'VALIDATION_ERROR' },
        400,
      )
    }
    try {
      const data = runCycles(c.get('store'), c.req.param('id'), { count, untilSettled })
      if (!data) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
      return c.json({ data })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

simulationsHandler.get(
  '/:id/events',
  validator('query', (value, c) => {
    const r = EventsQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    const limit = Math.min(c.req.valid('query').limit, c.get('config').eventLogLimit)
    const data = listEvents(c.get('store'), c.req.param('id'), { limit })
    if (!data) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
    return c.json({ data, meta: { count: data.length, limit } })
  },
)
