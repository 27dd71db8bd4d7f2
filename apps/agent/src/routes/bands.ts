/**
 * Band routes.
 *
 * Endpoints:
 * - GET /api/bands - Catalog bands with reference info
 * - GET /api/bands/aggregate - Per-band statistics (window_hours, default whole log)
 * - POST /api/bands/export - Write the band comparison CSV
 * - GET /api/bands/config - Router band mask
 * - PUT /api/bands/config - Apply a band mask, e.g. {"Band 3": true, "Band 7": false}
 * - POST /api/bands/test - Start a full band test in the background
 * - POST /api/bands/switch - Lock the router to one band, e.g. {"band": "Band 3"}
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Duration, Effect, Schema } from "effect"
import { BandCatalogTag } from "../services/BandCatalog.js"
import { DecisionEngineTag, type SwitchOutcome } from "../services/DecisionEngine.js"
import { MetricStoreTag } from "../services/MetricStore.js"
import { failWith } from "./errors.js"

const AggregateQuerySchema = Schema.Struct({
  window_hours: Schema.optional(Schema.NumberFromString),
})

const BandTestBodySchema = Schema.Struct({
  bands: Schema.optional(Schema.Array(Schema.String)),
  duration_seconds: Schema.optional(Schema.Number.pipe(Schema.positive())),
  interval_seconds: Schema.optional(Schema.Number.pipe(Schema.positive())),
})

const BandSwitchBodySchema = Schema.Struct({
  band: Schema.String,
})

const switchStatus = (outcome: SwitchOutcome): number => {
  switch (outcome._tag) {
    case "Busy":
      return 409
    case "Failed":
      return 502
    default:
      return 200
  }
}

/**
 * Band routes
 */
export const BandRoutes = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/api/bands",
    Effect.gen(function* () {
      const catalog = yield* BandCatalogTag
      return yield* HttpServerResponse.json({
        bands: catalog.bands.map((band) => ({ band, info: catalog.info(band) })),
      })
    })
  ),

  HttpRouter.get(
    "/api/bands/aggregate",
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest
      const url = new URL(request.url, "http://localhost")
      const query = yield* Schema.decodeUnknown(AggregateQuerySchema)({
        window_hours: url.searchParams.get("window_hours") ?? undefined,
      }).pipe(Effect.catchAll(() => Effect.succeed({ window_hours: undefined })))

      const store = yield* MetricStoreTag
      const aggregates = yield* store.perBandAggregate(
        query.window_hours !== undefined ? Duration.hours(query.window_hours) : undefined
      )

      return yield* HttpServerResponse.json({
        window_hours: query.window_hours ?? null,
        bands: Array.from(aggregates.values()),
      })
    }).pipe(Effect.catchAll(failWith("Failed to aggregate bands")))
  ),

  HttpRouter.post(
    "/api/bands/export",
    Effect.gen(function* () {
      const store = yield* MetricStoreTag
      const aggregates = yield* store.exportBandComparison()
      return yield* HttpServerResponse.json({ exported: aggregates.size })
    }).pipe(Effect.catchAll(failWith("Failed to export band comparison")))
  ),

  HttpRouter.get(
    "/api/bands/config",
    Effect.gen(function* () {
      const engine = yield* DecisionEngineTag
      const bands = yield* engine.getCurrentBandConfig()
      return yield* HttpServerResponse.json({ bands })
    }).pipe(Effect.catchAll(failWith("Failed to get band configuration")))
  ),

  HttpRouter.put(
    "/api/bands/config",
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest
      const body = yield* request.json
      const engine = yield* DecisionEngineTag
      const result = yield* engine.setBandConfiguration(body)
      return yield* HttpServerResponse.json(result, { status: result.accepted ? 200 : 502 })
    }).pipe(Effect.catchAll(failWith("Failed to set band configuration")))
  ),

  HttpRouter.post(
    "/api/bands/test",
    Effect.gen(function* () {
      const body = yield* HttpServerRequest.schemaBodyJson(BandTestBodySchema)
      const engine = yield* DecisionEngineTag

      const { bands } = yield* engine.startBandTest({
        bands: body.bands,
        duration: body.duration_seconds !== undefined ? Duration.seconds(body.duration_seconds) : undefined,
        interval: body.interval_seconds !== undefined ? Duration.seconds(body.interval_seconds) : undefined,
      })

      return yield* HttpServerResponse.json({ started: true, bands }, { status: 202 })
    }).pipe(Effect.catchAll(failWith("Failed to start band test")))
  ),

  HttpRouter.post(
    "/api/bands/switch",
    Effect.gen(function* () {
      const body = yield* HttpServerRequest.schemaBodyJson(BandSwitchBodySchema)
      const engine = yield* DecisionEngineTag
      const outcome = yield* engine.switchToBand(body.band)
      return yield* HttpServerResponse.json(outcome, { status: switchStatus(outcome) })
    }).pipe(Effect.catchAll(failWith("Failed to switch band")))
  )
)
