// ---------------------------------------------------------------------------
// Lambda entry point
//
// Wraps the Hono app with the AWS Lambda adapter. Simulations live in the
// memory of a warm function instance and vanish when it is recycled.
//
// Environment variables: see config.ts.
// ---------------------------------------------------------------------------

import { handle } from 'hono/aws-lambda'
import { app } from './app'

export const handler = handle(app)
