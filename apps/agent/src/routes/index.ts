/**
 * Route handlers for the BandPilot agent API.
 *
 * Health:
 * - GET /health - Full health status
 * - GET /health/live - Liveness probe
 * - GET /health/ready - Readiness probe
 *
 * Signal:
 * - GET /api/signal - Current router reading
 * - GET /api/signal/summary - Window summary
 * - GET /api/signal/history - Persisted records
 *
 * Bands:
 * - GET /api/bands - Catalog
 * - GET /api/bands/aggregate - Per-band statistics
 * - POST /api/bands/export - Band comparison CSV
 * - GET /api/bands/config - Router band mask
 * - PUT /api/bands/config - Apply a band mask
 * - POST /api/bands/test - Start a band test
 * - POST /api/bands/switch - Manual band switch
 *
 * Decision:
 * - GET /api/decision/status
 * - POST /api/decision/smart-switch
 * - POST /api/decision/optimize
 * - PUT /api/decision/auto-switch
 *
 * Monitor / optimizer:
 * - GET /api/monitor/stats, POST /api/monitor/start|stop|tick
 * - GET /api/optimizer/stats, POST /api/optimizer/start|stop
 */

export * from "./health.js"
export * from "./signal.js"
export * from "./bands.js"
export * from "./decision.js"
export * from "./monitor.js"
