/**
 * Error-to-response mapping shared by the route handlers.
 */
import { HttpServerResponse } from "@effect/platform"
import { describeTransportFailure, TransportFailure } from "../services/RouterClient.js"

const STATUS_BY_TAG: Readonly<Record<string, number>> = {
  ConfigurationError: 400,
  ParseError: 400,
  RequestError: 400,
  BandTestInProgress: 409,
  MonitorError: 409,
  SchedulerError: 409,
  PersistenceFailure: 500,
}

const tagOf = (error: unknown): string | null =>
  typeof error === "object" && error !== null && "_tag" in error && typeof error._tag === "string"
    ? error._tag
    : null

const messageOf = (error: unknown): string => {
  if (error instanceof TransportFailure) return describeTransportFailure(error)
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message
  }
  return String(error)
}

export const statusOf = (error: unknown): number => {
  if (error instanceof TransportFailure) {
    return error.reason === "timeout" ? 504 : 502
  }
  const tag = tagOf(error)
  return (tag !== null ? STATUS_BY_TAG[tag] : undefined) ?? 500
}

/**
 * JSON error body: `{ error, type }` with a status derived from the error tag
 */
export const failWith = (context: string) => (error: unknown) =>
  HttpServerResponse.json(
    { error: `${context}: ${messageOf(error)}`, type: tagOf(error) },
    { status: statusOf(error) }
  )
