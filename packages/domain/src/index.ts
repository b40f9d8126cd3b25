// ---------------------------------------------------------------------------
// @fleetline/domain: public surface of the dispatch engine.
// ---------------------------------------------------------------------------

export * from './shared/types'
export * from './shared/errors'
export * from './events/index'
export * from './fleet/index'
export * from './mission/index'
export * from './dispatch/index'
export * from './simulation/index'
