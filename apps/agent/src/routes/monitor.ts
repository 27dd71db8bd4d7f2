/**
 * Monitor and optimizer control routes.
 *
 * Endpoints:
 * - GET /api/monitor/stats - Polling statistics
 * - POST /api/monitor/start - Start polling
 * - POST /api/monitor/stop - Stop polling
 * - POST /api/monitor/tick - Take one measurement now
 * - GET /api/optimizer/stats - Optimization schedule statistics
 * - POST /api/optimizer/start - Start the optimization schedule
 * - POST /api/optimizer/stop - Stop the optimization schedule
 */

import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { MonitorServiceTag } from "../services/MonitorService.js"
import { OptimizationSchedulerTag } from "../services/OptimizationScheduler.js"
import { failWith } from "./errors.js"

/**
 * Monitor routes
 */
export const MonitorRoutes = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/api/monitor/stats",
    Effect.gen(function* () {
      const monitor = yield* MonitorServiceTag
      return yield* HttpServerResponse.json(yield* monitor.getStats())
    })
  ),

  HttpRouter.post(
    "/api/monitor/start",
    Effect.gen(function* () {
      const monitor = yield* MonitorServiceTag
      yield* monitor.start()
      return yield* HttpServerResponse.json({ success: true, message: "Monitor started" })
    }).pipe(Effect.catchAll(failWith("Failed to start monitor")))
  ),

  HttpRouter.post(
    "/api/monitor/stop",
    Effect.gen(function* () {
      const monitor = yield* MonitorServiceTag
      const graceful = yield* monitor.stop()
      return yield* HttpServerResponse.json({ success: true, graceful })
    }).pipe(Effect.catchAll(failWith("Failed to stop monitor")))
  ),

  HttpRouter.post(
    "/api/monitor/tick",
    Effect.gen(function* () {
      const monitor = yield* MonitorServiceTag
      const result = yield* monitor.tick()
      return yield* HttpServerResponse.json(result, { status: result._tag === "Recorded" ? 200 : 503 })
    })
  ),

  HttpRouter.get(
    "/api/optimizer/stats",
    Effect.gen(function* () {
      const optimizer = yield* OptimizationSchedulerTag
      return yield* HttpServerResponse.json(yield* optimizer.getStats())
    })
  ),

  HttpRouter.post(
    "/api/optimizer/start",
    Effect.gen(function* () {
      const optimizer = yield* OptimizationSchedulerTag
      yield* optimizer.start()
      return yield* HttpServerResponse.json({ success: true, message: "Optimizer started" })
    }).pipe(Effect.catchAll(failWith("Failed to start optimizer")))
  ),

  HttpRouter.post(
    "/api/optimizer/stop",
    Effect.gen(function* () {
      const optimizer = yield* OptimizationSchedulerTag
      const graceful = yield* optimizer.stop()
      return yield* HttpServerResponse.json({ success: true, graceful })
    }).pipe(Effect.catchAll(failWith("Failed to stop optimizer")))
  )
)
