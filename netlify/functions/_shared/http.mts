/**
 * Ledgerwise - HTTP helpers shared by the functions
 */

import type { z } from "zod"
import { ScoringError, TrainingError, UpstreamError, ValidationError } from "../../../src/engine/errors.ts"
import type { Logger } from "../../../src/engine/logger.ts"

export function json(data: object, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  })
}

export function error(message: string, status = 400, code?: string, extra: object = {}): Response {
  return json({ error: true, message, code, ...extra }, status)
}

/** Parse a JSON body against `schema`; any mismatch is a ValidationError naming the fields */
export async function readBody<T>(req: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let body: unknown
  try {
    body = await req.json()
  } catch {
    throw new ValidationError("Request body must be valid JSON", ["body"])
  }
  const result = schema.safeParse(body)
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map(i => i.path.join(".") || "body"))]
    throw new ValidationError(`Invalid request: ${result.error.issues.map(i => i.message).join(", ")}`, fields)
  }
  return result.data
}

/** Map the error taxonomy onto HTTP responses */
export function errorResponse(e: unknown, log: Logger): Response {
  if (e instanceof ValidationError) {
    return error(e.message, 400, "VALIDATION_ERROR", { fields: e.fields })
  }
  if (e instanceof ScoringError) {
    log.warn(e.message)
    return error(e.message, 422, "SCORING_ERROR", { features: e.features })
  }
  if (e instanceof TrainingError) {
    log.warn(e.message)
    return error(e.message, 422, "TRAINING_ERROR", e.sampleIndex === undefined ? {} : { sampleIndex: e.sampleIndex })
  }
  if (e instanceof UpstreamError) {
    log.error(`${e.service} ${e.reason}: ${e.message}`)
    return error(`The ${e.service === "advisor" ? "advisor" : "data store"} is unavailable right now`, 503, "UPSTREAM_ERROR", {
      service: e.service,
      reason: e.reason,
    })
  }
  log.error("unhandled", e)
  return error("Internal server error", 500)
}
