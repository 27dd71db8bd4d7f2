/**
 * Health check route handlers.
 *
 * - GET /health - Full health status with component details
 * - GET /health/live - Liveness probe
 * - GET /health/ready - Readiness probe (router reachable)
 */

import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect, Either } from "effect"
import { VERSION } from "@bandpilot/shared"
import { AgentConfigService } from "../config/AgentConfig.js"
import { MetricStoreTag } from "../services/MetricStore.js"
import { MonitorServiceTag } from "../services/MonitorService.js"
import { describeTransportFailure, RouterClientTag, withRouterTimeout } from "../services/RouterClient.js"

interface ComponentHealth {
  readonly name: "router" | "metric_store" | "monitor"
  readonly healthy: boolean
  readonly message: string
}

interface HealthStatus {
  readonly status: "healthy" | "degraded" | "unhealthy"
  readonly uptime_seconds: number
  readonly version: string
  readonly timestamp: string
  readonly components: readonly ComponentHealth[]
  readonly last_sample_at: string | null
  /** Share of monitor ticks that recorded a sample */
  readonly poll_success_rate: number | null
}

const startTime = Date.now()

const routerHealth = Effect.gen(function* () {
  const router = yield* RouterClientTag
  const config = yield* AgentConfigService
  const status = yield* router
    .getConnectionStatus()
    .pipe(withRouterTimeout("getConnectionStatus", config.routerTimeout), Effect.either)
  return {
    name: "router",
    healthy: Either.isRight(status),
    message: Either.isRight(status) ? "reachable" : describeTransportFailure(status.left),
  } satisfies ComponentHealth
})

const getHealthStatus = Effect.gen(function* () {
  const store = yield* MetricStoreTag
  const monitor = yield* MonitorServiceTag

  const router = yield* routerHealth
  const stats = yield* monitor.getStats()
  const records = yield* store.count()

  const components: ComponentHealth[] = [
    router,
    { name: "metric_store", healthy: true, message: `${records} records in ${store.csvPath}` },
    {
      name: "monitor",
      healthy: stats.is_running,
      message: stats.is_running ? "running" : "stopped",
    },
  ]

  const unhealthy = components.filter((c) => !c.healthy).length
  const status: HealthStatus = {
    status: unhealthy === 0 ? "healthy" : router.healthy ? "degraded" : "unhealthy",
    uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    version: VERSION,
    timestamp: new Date().toISOString(),
    components,
    last_sample_at: stats.last_sample_at,
    poll_success_rate:
      stats.ticks > 0 ? Math.round((stats.samples_recorded / stats.ticks) * 1000) / 1000 : null,
  }
  return status
})

/**
 * Health routes
 */
export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/health",
    Effect.gen(function* () {
      const status = yield* getHealthStatus
      return yield* HttpServerResponse.json(status, {
        status: status.status === "unhealthy" ? 503 : 200,
      })
    })
  ),

  HttpRouter.get("/health/live", HttpServerResponse.json({ status: "ok" })),

  HttpRouter.get(
    "/health/ready",
    Effect.gen(function* () {
      const router = yield* routerHealth
      return yield* router.healthy
        ? HttpServerResponse.json({ status: "ready" })
        : HttpServerResponse.json({ status: "not_ready", reason: router.message }, { status: 503 })
    })
  )
)
