/**
 * SimulatedRouter - in-process RouterClient.
 *
 * Produces readings from per-band signal profiles, follows band switches and
 * records every band change. Used by the default entry point and the tests.
 */
import { Clock, Effect, Layer, Random, Ref } from "effect"
import type { SignalSample } from "../schema/Signal.js"
import type { BandId, BandMask } from "./BandCatalog.js"
import { RouterClientTag, TransportFailure, type RouterClient } from "./RouterClient.js"

// ============================================
// Types
// ============================================

export interface BandProfile {
  readonly rsrp: number
  readonly rsrq: number
  readonly sinr: number
  readonly rssi: number
  readonly cellId?: string
}

export interface SimulatedRouterOptions {
  readonly bands: readonly string[]
  readonly initialBand: string
  /** Bands without a profile report no signal */
  readonly profiles: Readonly<Record<string, BandProfile>>
  /** Uniform noise added to every reading, in dB */
  readonly jitter?: number
  readonly plmn?: string
  /** Bands the router refuses to lock to */
  readonly refusedBands?: readonly string[]
}

export interface SimulatedRouter extends RouterClient {
  readonly currentBand: () => Effect.Effect<string>
  readonly bandChanges: () => Effect.Effect<readonly string[]>
  readonly maskChanges: () => Effect.Effect<readonly BandMask[]>
  readonly setReachable: (reachable: boolean) => Effect.Effect<void>
}

// ============================================
// Implementation
// ============================================

export const makeSimulatedRouter = (
  options: SimulatedRouterOptions
): Effect.Effect<SimulatedRouter> =>
  Effect.gen(function* () {
    const currentBandRef = yield* Ref.make(options.initialBand)
    const enabledRef = yield* Ref.make<ReadonlySet<string>>(new Set(options.bands))
    const bandChangesRef = yield* Ref.make<readonly string[]>([])
    const maskChangesRef = yield* Ref.make<readonly BandMask[]>([])
    const reachableRef = yield* Ref.make(true)
    const jitter = options.jitter ?? 0
    const refused = new Set(options.refusedBands ?? [])

    const ensureReachable = (operation: string) =>
      Effect.gen(function* () {
        const reachable = yield* Ref.get(reachableRef)
        if (!reachable) {
          return yield* Effect.fail(
            new TransportFailure(operation, "unreachable", "Simulated router is unreachable")
          )
        }
      })

    const noise = jitter > 0 ? Random.nextRange(-jitter, jitter) : Effect.succeed(0)

    const getSignalSample = (): Effect.Effect<SignalSample | null, TransportFailure> =>
      Effect.gen(function* () {
        yield* ensureReachable("getSignalSample")
        const band = yield* Ref.get(currentBandRef)
        const profile = options.profiles[band]
        if (profile === undefined) return null

        const now = yield* Clock.currentTimeMillis
        const sinrNoise = yield* noise
        const rsrpNoise = yield* noise

        return {
          timestamp: new Date(now),
          band,
          rsrp: profile.rsrp + rsrpNoise,
          rsrq: profile.rsrq,
          sinr: profile.sinr + sinrNoise,
          rssi: profile.rssi + rsrpNoise,
          cellId: profile.cellId ?? `cell-${band.replace(/\s+/g, "").toLowerCase()}`,
          plmn: options.plmn ?? "00101",
        }
      })

    const setBand = (band: BandId): Effect.Effect<boolean, TransportFailure> =>
      Effect.gen(function* () {
        yield* ensureReachable("setBand")
        yield* Ref.update(bandChangesRef, (changes) => [...changes, band])
        if (refused.has(band)) return false
        yield* Ref.set(currentBandRef, band)
        yield* Ref.set(enabledRef, new Set([band]))
        return true
      })

    const setBandMask = (mask: BandMask): Effect.Effect<boolean, TransportFailure> =>
      Effect.gen(function* () {
        yield* ensureReachable("setBandMask")
        yield* Ref.update(maskChangesRef, (changes) => [...changes, mask])
        const enabled: string[] = Array.from(mask.entries())
          .filter(([, on]) => on)
          .map(([band]) => band)
        if (enabled.length === 0) return false

        yield* Ref.set(enabledRef, new Set(enabled))
        const current = yield* Ref.get(currentBandRef)
        if (!enabled.includes(current)) {
          yield* Ref.set(currentBandRef, enabled[0])
        }
        return true
      })

    const router: SimulatedRouter = {
      authenticate: () => ensureReachable("authenticate").pipe(Effect.as(true)),

      getSignalSample,

      getAvailableBands: () => ensureReachable("getAvailableBands").pipe(Effect.as(options.bands)),

      setBand,

      setBandMask,

      getCurrentBandConfig: () =>
        Effect.gen(function* () {
          yield* ensureReachable("getCurrentBandConfig")
          const enabled = yield* Ref.get(enabledRef)
          return Object.fromEntries(options.bands.map((band) => [band, enabled.has(band)]))
        }),

      getConnectionStatus: () =>
        Effect.gen(function* () {
          yield* ensureReachable("getConnectionStatus")
          return {
            connected: true,
            band: yield* Ref.get(currentBandRef),
            plmn: options.plmn ?? "00101",
            simulated: true,
          }
        }),

      close: () => Effect.void,

      currentBand: () => Ref.get(currentBandRef),

      bandChanges: () => Ref.get(bandChangesRef),

      maskChanges: () => Ref.get(maskChangesRef),

      setReachable: (reachable) => Ref.set(reachableRef, reachable),
    }

    return router
  })

// ============================================
// Layer
// ============================================

export const SimulatedRouterLive = (options: SimulatedRouterOptions) =>
  Layer.effect(RouterClientTag, makeSimulatedRouter(options))

/** Profiles used when the agent runs without a device transport */
export const DEMO_ROUTER_OPTIONS: SimulatedRouterOptions = {
  bands: ["Band 1", "Band 3", "Band 7", "Band 20"],
  initialBand: "Band 3",
  jitter: 3,
  plmn: "00101",
  profiles: {
    "Band 1": { rsrp: -98, rsrq: -12, sinr: 6, rssi: -70 },
    "Band 3": { rsrp: -88, rsrq: -10, sinr: 12, rssi: -62 },
    "Band 7": { rsrp: -104, rsrq: -14, sinr: 9, rssi: -75 },
    "Band 20": { rsrp: -82, rsrq: -11, sinr: 3, rssi: -58 },
  },
}
