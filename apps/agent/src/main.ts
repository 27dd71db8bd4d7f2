/**
 * BandPilot agent entry point.
 *
 * Wires the service graph, starts the polling monitor and the optimization
 * schedule, and serves the HTTP API. Without a device transport the router is
 * the in-process simulator.
 *
 * Run with: npm start
 *
 * API:
 * - GET  /health, /health/live, /health/ready
 * - GET  /api/signal, /api/signal/summary, /api/signal/history
 * - GET  /api/bands, /api/bands/aggregate, /api/bands/config
 * - PUT  /api/bands/config
 * - POST /api/bands/export, /api/bands/test, /api/bands/switch
 * - GET  /api/decision/status
 * - POST /api/decision/smart-switch, /api/decision/optimize
 * - PUT  /api/decision/auto-switch
 * - GET  /api/monitor/stats, /api/optimizer/stats
 * - POST /api/monitor/start|stop|tick, /api/optimizer/start|stop
 */

import { createServer } from "node:http"
import { HttpRouter, HttpServer, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { NodeContext, NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Config, Effect, Layer, Logger, LogLevel } from "effect"

import { AgentConfigLive, StoreConfigLive } from "./config/AgentConfig.js"
import { BandRoutes, DecisionRoutes, HealthRoutes, MonitorRoutes, SignalRoutes } from "./routes/index.js"
import {
  BandCatalogLive,
  DecisionEngineLive,
  DEMO_ROUTER_OPTIONS,
  MetricStoreLive,
  MonitorServiceLive,
  MonitorServiceTag,
  OptimizationSchedulerLive,
  OptimizationSchedulerTag,
  SimulatedRouterLive,
} from "./services/index.js"

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization",
}

// Config, router and platform
const BaseLayer = Layer.mergeAll(
  AgentConfigLive,
  StoreConfigLive,
  SimulatedRouterLive(DEMO_ROUTER_OPTIONS),
  NodeContext.layer
)

// Every service, built once and shared by the loops and the routes
const ServicesLayer = Layer.mergeAll(MonitorServiceLive, OptimizationSchedulerLive).pipe(
  Layer.provideMerge(DecisionEngineLive),
  Layer.provideMerge(Layer.mergeAll(MetricStoreLive, BandCatalogLive)),
  Layer.provideMerge(BaseLayer)
)

// Start the polling monitor and the optimization schedule
const LoopsLive = Layer.effectDiscard(
  Effect.gen(function* () {
    const monitor = yield* MonitorServiceTag
    const optimizer = yield* OptimizationSchedulerTag
    yield* monitor.start()
    yield* optimizer.start()
  })
)

// Combine all route handlers
const router = HttpRouter.empty.pipe(
  HttpRouter.mount("/", HealthRoutes),
  HttpRouter.mount("/", SignalRoutes),
  HttpRouter.mount("/", BandRoutes),
  HttpRouter.mount("/", DecisionRoutes),
  HttpRouter.mount("/", MonitorRoutes),
  HttpRouter.use((httpApp) =>
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest

      // Handle preflight OPTIONS requests
      if (request.method === "OPTIONS") {
        return HttpServerResponse.empty({
          status: 204,
          headers: { ...CORS_HEADERS, "Access-Control-Max-Age": "86400" },
        })
      }

      const response = yield* httpApp
      return HttpServerResponse.setHeaders(response, CORS_HEADERS)
    })
  )
)

const makeAppLayer = (port: number) =>
  Layer.mergeAll(
    router.pipe(HttpServer.serve(), HttpServer.withLogAddress),
    LoopsLive
  ).pipe(
    Layer.provide(NodeHttpServer.layer(createServer, { port })),
    Layer.provide(ServicesLayer)
  )

// Main program
const main = Effect.gen(function* () {
  const port = yield* Config.integer("PORT").pipe(Config.withDefault(3001))
  const logLevel = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))

  yield* Effect.logInfo(`BandPilot agent starting on http://localhost:${port}`)
  yield* Layer.launch(makeAppLayer(port)).pipe(Logger.withMinimumLogLevel(logLevel))
})

NodeRuntime.runMain(main)
