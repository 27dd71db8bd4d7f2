/**
 * Signal routes.
 *
 * Endpoints:
 * - GET /api/signal - Current router reading, scored
 * - GET /api/signal/summary - Window summary (window_minutes, default 60)
 * - GET /api/signal/history - Persisted records (duration_minutes, limit)
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Duration, Effect, Schema } from "effect"
import { bandwidthScore, classifySample } from "@bandpilot/shared"
import { AgentConfigService } from "../config/AgentConfig.js"
import { MetricStoreTag } from "../services/MetricStore.js"
import { RouterClientTag, withRouterTimeout } from "../services/RouterClient.js"
import { failWith } from "./errors.js"

const SummaryQuerySchema = Schema.Struct({
  window_minutes: Schema.optional(Schema.NumberFromString),
})

const HistoryQuerySchema = Schema.Struct({
  duration_minutes: Schema.optional(Schema.NumberFromString),
  limit: Schema.optional(Schema.NumberFromString),
})

const searchParams = Effect.map(
  HttpServerRequest.HttpServerRequest,
  (request) => new URL(request.url, "http://localhost").searchParams
)

/**
 * Signal routes
 */
export const SignalRoutes = HttpRouter.empty.pipe(
  // GET /api/signal - Current signal metrics
  HttpRouter.get(
    "/api/signal",
    Effect.gen(function* () {
      const router = yield* RouterClientTag
      const config = yield* AgentConfigService
      const sample = yield* router
        .getSignalSample()
        .pipe(withRouterTimeout("getSignalSample", config.routerTimeout))

      if (sample === null) {
        return yield* HttpServerResponse.json({ error: "No signal data available" }, { status: 503 })
      }

      return yield* HttpServerResponse.json({
        ...sample,
        signal_quality: classifySample(sample),
        bandwidth_score: bandwidthScore(sample.sinr, sample.rsrp),
      })
    }).pipe(Effect.catchAll(failWith("Failed to get signal")))
  ),

  // GET /api/signal/summary - Aggregate over a trailing window
  HttpRouter.get(
    "/api/signal/summary",
    Effect.gen(function* () {
      const params = yield* searchParams
      const query = yield* Schema.decodeUnknown(SummaryQuerySchema)({
        window_minutes: params.get("window_minutes") ?? undefined,
      }).pipe(Effect.catchAll(() => Effect.succeed({ window_minutes: undefined })))

      const windowMinutes = query.window_minutes ?? 60
      const store = yield* MetricStoreTag
      const summary = yield* store.summary(Duration.minutes(windowMinutes))

      return yield* HttpServerResponse.json({ window_minutes: windowMinutes, summary })
    }).pipe(Effect.catchAll(failWith("Failed to summarize signal")))
  ),

  // GET /api/signal/history - Persisted records with time range
  HttpRouter.get(
    "/api/signal/history",
    Effect.gen(function* () {
      const params = yield* searchParams
      const query = yield* Schema.decodeUnknown(HistoryQuerySchema)({
        duration_minutes: params.get("duration_minutes") ?? undefined,
        limit: params.get("limit") ?? undefined,
      }).pipe(
        Effect.catchAll(() => Effect.succeed({ duration_minutes: undefined, limit: undefined }))
      )

      const durationMinutes = query.duration_minutes ?? 60
      const store = yield* MetricStoreTag
      const records = yield* store.records(Duration.minutes(durationMinutes))
      const data = query.limit !== undefined && query.limit > 0 ? records.slice(-query.limit) : records

      return yield* HttpServerResponse.json({
        count: data.length,
        duration_minutes: durationMinutes,
        data,
      })
    }).pipe(Effect.catchAll(failWith("Failed to get signal history")))
  )
)
