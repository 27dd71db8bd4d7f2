/**
 * Router boundary.
 *
 * The agent only consumes this interface. HTTP sessions, tokens and retries
 * against a physical device belong to whichever layer provides RouterClientTag.
 */
import { Context, Duration, Effect } from "effect"
import type { SignalSample } from "../schema/Signal.js"
import type { BandId, BandMask } from "./BandCatalog.js"

// ============================================
// Error Types
// ============================================

export class TransportFailure {
  readonly _tag = "TransportFailure"
  constructor(
    readonly operation: string,
    readonly reason: "timeout" | "unreachable" | "rejected" | "unknown",
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// RouterClient Interface
// ============================================

export interface RouterClient {
  readonly authenticate: () => Effect.Effect<boolean, TransportFailure>

  /**
   * Current signal reading, or null when the router reports no signal
   */
  readonly getSignalSample: () => Effect.Effect<SignalSample | null, TransportFailure>

  readonly getAvailableBands: () => Effect.Effect<readonly string[], TransportFailure>

  /**
   * Lock the router to a single band. Resolves false when the router refuses.
   */
  readonly setBand: (band: BandId) => Effect.Effect<boolean, TransportFailure>

  readonly setBandMask: (mask: BandMask) => Effect.Effect<boolean, TransportFailure>

  readonly getCurrentBandConfig: () => Effect.Effect<
    Readonly<Record<string, boolean>>,
    TransportFailure
  >

  readonly getConnectionStatus: () => Effect.Effect<
    Readonly<Record<string, unknown>>,
    TransportFailure
  >

  readonly close: () => Effect.Effect<void>
}

export class RouterClientTag extends Context.Tag("RouterClient")<
  RouterClientTag,
  RouterClient
>() {}

// ============================================
// Helpers
// ============================================

/**
 * Bound a router round trip, mapping an elapsed deadline to a TransportFailure
 */
export const withRouterTimeout =
  (operation: string, timeout: Duration.Duration) =>
  <A, R>(self: Effect.Effect<A, TransportFailure, R>): Effect.Effect<A, TransportFailure, R> =>
    self.pipe(
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () =>
          new TransportFailure(
            operation,
            "timeout",
            `${operation} timed out after ${Duration.format(timeout)}`
          ),
      })
    )

export const describeTransportFailure = (error: TransportFailure): string => {
  const causeInfo =
    error.cause instanceof Error
      ? ` | cause: ${error.cause.message}`
      : error.cause
        ? ` | cause: ${String(error.cause)}`
        : ""
  return `[${error.reason}] ${error.operation}: ${error.message}${causeInfo}`
}
