/**
 * Decision routes.
 *
 * Endpoints:
 * - GET /api/decision/status - Engine state
 * - POST /api/decision/smart-switch - Switch to the best recent band
 * - POST /api/decision/optimize - Run peak / off-peak optimization now
 * - PUT /api/decision/auto-switch - Enable or disable auto-switching
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Schema } from "effect"
import { DecisionEngineTag } from "../services/DecisionEngine.js"
import { failWith } from "./errors.js"

const AutoSwitchBodySchema = Schema.Struct({
  enabled: Schema.Boolean,
})

/**
 * Decision routes
 */
export const DecisionRoutes = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/api/decision/status",
    Effect.gen(function* () {
      const engine = yield* DecisionEngineTag
      const status = yield* engine.getStatus()
      return yield* HttpServerResponse.json(status)
    })
  ),

  HttpRouter.post(
    "/api/decision/smart-switch",
    Effect.gen(function* () {
      const engine = yield* DecisionEngineTag
      const outcome = yield* engine.smartSwitch()
      return yield* HttpServerResponse.json(outcome, { status: outcome._tag === "Failed" ? 502 : 200 })
    })
  ),

  HttpRouter.post(
    "/api/decision/optimize",
    Effect.gen(function* () {
      const engine = yield* DecisionEngineTag
      const result = yield* engine.optimizeForPeakHours()
      return yield* HttpServerResponse.json(result)
    })
  ),

  HttpRouter.put(
    "/api/decision/auto-switch",
    Effect.gen(function* () {
      const body = yield* HttpServerRequest.schemaBodyJson(AutoSwitchBodySchema)
      const engine = yield* DecisionEngineTag
      yield* engine.setAutoSwitch(body.enabled)
      return yield* HttpServerResponse.json({ auto_switch_enabled: body.enabled })
    }).pipe(Effect.catchAll(failWith("Failed to update auto-switch")))
  )
)
