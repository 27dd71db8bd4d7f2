/**
 * BandCatalog - the closed set of band ids the router reported at startup.
 *
 * Band ids and band masks from callers are validated here, before anything
 * reaches the DecisionEngine or the router.
 */
import { Brand, Context, Effect, Either, Layer } from "effect"
import { AgentConfigService } from "../config/AgentConfig.js"
import { RouterClientTag, describeTransportFailure } from "./RouterClient.js"

// ============================================
// Types
// ============================================

export type BandId = string & Brand.Brand<"BandId">

export type BandMask = ReadonlyMap<BandId, boolean>

export interface BandInfo {
  readonly freqRange: string
  readonly bandwidth: string
}

/** Reference data for common LTE bands */
export const LTE_BAND_INFO: Readonly<Record<string, BandInfo>> = {
  "Band 1": { freqRange: "2100 MHz", bandwidth: "20 MHz" },
  "Band 3": { freqRange: "1800 MHz", bandwidth: "20 MHz" },
  "Band 7": { freqRange: "2600 MHz", bandwidth: "20 MHz" },
  "Band 8": { freqRange: "900 MHz", bandwidth: "10 MHz" },
  "Band 20": { freqRange: "800 MHz", bandwidth: "10 MHz" },
  "Band 28": { freqRange: "700 MHz", bandwidth: "10 MHz" },
  "Band 38": { freqRange: "2600 MHz", bandwidth: "20 MHz" },
  "Band 40": { freqRange: "2300 MHz", bandwidth: "20 MHz" },
}

// ============================================
// Error Types
// ============================================

export class ConfigurationError {
  readonly _tag = "ConfigurationError"
  constructor(
    readonly field: string,
    readonly message: string
  ) {}
}

// ============================================
// Catalog
// ============================================

export interface BandCatalog {
  readonly bands: readonly BandId[]
  readonly has: (band: string) => band is BandId
  readonly parse: (band: string) => Either.Either<BandId, ConfigurationError>
  readonly parseAll: (
    bands: readonly string[]
  ) => Either.Either<readonly BandId[], ConfigurationError>
  /**
   * Validate a loosely-typed band mask, e.g. a decoded JSON body
   */
  readonly parseMask: (input: unknown) => Either.Either<BandMask, ConfigurationError>
  readonly info: (band: BandId) => BandInfo | null
}

export class BandCatalogTag extends Context.Tag("BandCatalog")<BandCatalogTag, BandCatalog>() {}

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const makeBandCatalog = (available: readonly string[]): BandCatalog => {
  const known = new Set(available.map((band) => band.trim()).filter((band) => band.length > 0))
  const bands = Array.from(known, (band) => Brand.nominal<BandId>()(band))

  const has = (band: string): band is BandId => known.has(band)

  const parse = (band: string): Either.Either<BandId, ConfigurationError> =>
    has(band)
      ? Either.right(band)
      : Either.left(
          new ConfigurationError("band", `Unknown band "${band}". Available: ${bands.join(", ")}`)
        )

  const parseAll = (requested: readonly string[]) => Either.all(requested.map(parse))

  const parseMask = (input: unknown): Either.Either<BandMask, ConfigurationError> => {
    if (!isRecord(input)) {
      return Either.left(new ConfigurationError("mask", "Band mask must be an object of band -> boolean"))
    }
    const mask = new Map<BandId, boolean>()
    for (const [band, enabled] of Object.entries(input)) {
      if (!has(band)) {
        return Either.left(new ConfigurationError(band, `Unknown band "${band}"`))
      }
      if (typeof enabled !== "boolean") {
        return Either.left(new ConfigurationError(band, `Expected boolean for "${band}"`))
      }
      mask.set(band, enabled)
    }
    if (mask.size === 0) {
      return Either.left(new ConfigurationError("mask", "Band mask is empty"))
    }
    if (!Array.from(mask.values()).some(Boolean)) {
      return Either.left(new ConfigurationError("mask", "At least one band must stay enabled"))
    }
    return Either.right(mask)
  }

  return {
    bands,
    has,
    parse,
    parseAll,
    parseMask,
    info: (band) => LTE_BAND_INFO[band] ?? null,
  }
}

// ============================================
// Layer
// ============================================

/**
 * Build the catalog from the router's reported bands, falling back to the
 * configured defaults when the router cannot answer
 */
export const BandCatalogLive = Layer.effect(
  BandCatalogTag,
  Effect.gen(function* () {
    const config = yield* AgentConfigService
    const router = yield* RouterClientTag

    const reported = yield* router.getAvailableBands().pipe(
      Effect.catchAll((error) =>
        Effect.gen(function* () {
          yield* Effect.logWarning(
            `Could not retrieve available bands, using defaults: ${describeTransportFailure(error)}`
          )
          return config.defaultBands
        })
      )
    )

    const catalog = makeBandCatalog(reported.length > 0 ? reported : config.defaultBands)
    yield* Effect.logInfo(`Band catalog: ${catalog.bands.join(", ")}`)
    return catalog
  })
)
