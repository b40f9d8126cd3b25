export * from './simulation.repository'
