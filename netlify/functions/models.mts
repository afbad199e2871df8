/**
 * Ledgerwise - Scoring Models API (Netlify Serverless Function)
 *
 * Endpoints (via ?action= query param):
 *   GET  latest   - artifact currently used for scoring, plus published versions
 *   GET  get      - one artifact by ?version=
 *   POST train    - fit and publish a new version (admin token required)
 */

import type { Config } from "@netlify/functions"
import { z } from "zod"
import { trainModel } from "../../src/engine/model-training.ts"
import { REQUIRED_FEATURES } from "../../src/engine/scoring.ts"
import { error, errorResponse, json, readBody } from "./_shared/http.mts"
import { getServices } from "./_shared/services.mts"
import type { Services } from "./_shared/services.mts"

// Shape is checked loosely here; trainModel reports the offending sample
const trainSchema = z.object({
  samples: z.array(z.object({
    features: z.record(z.number().nullable()),
    outcome: z.record(z.number().nullable()),
  })).max(10000),
  lambda: z.number().min(0).optional(),
})

const OUTCOME_KEYS = ["riskScore", "investmentReadiness"] as const

/** JSON carries NaN as null; dropped values surface as missing in trainModel */
function pick<K extends string>(record: Record<string, number | null>, keys: readonly K[]): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {}
  for (const key of keys) {
    const value = record[key]
    if (typeof value === "number") out[key] = value
  }
  return out
}

async function handleTrain(req: Request, services: Services): Promise<Response> {
  const token = services.config.adminToken
  if (!token) return error("Model training is disabled", 403, "TRAINING_DISABLED")
  if (req.headers.get("x-admin-token") !== token) return error("Forbidden", 403)

  const { samples, lambda } = await readBody(req, trainSchema)
  const draft = trainModel(
    samples.map(s => ({ features: pick(s.features, REQUIRED_FEATURES), outcome: pick(s.outcome, OUTCOME_KEYS) })),
    { lambda },
  )
  const artifact = await services.models.publish(draft)
  return json({ success: true, model: artifact }, 201)
}

export async function handleModels(req: Request, services: Services): Promise<Response> {
  const url = new URL(req.url)
  const action = url.searchParams.get("action") || "latest"
  try {
    switch (action) {
      case "latest": {
        const [model, versions] = await Promise.all([services.models.latest(), services.models.versions()])
        return json({ model, versions })
      }
      case "get": {
        const version = Number(url.searchParams.get("version"))
        if (!Number.isInteger(version) || version < 0) return error("version must be a non-negative integer")
        const model = await services.models.get(version)
        return model ? json({ model }) : error(`Model ${version} not found`, 404)
      }
      case "train":
        if (req.method !== "POST") return error("POST required", 405)
        return await handleTrain(req, services)
      default:
        return error(`Unknown action: ${action}`, 400)
    }
  } catch (e) {
    return errorResponse(e, services.logger("Models"))
  }
}

export default async (req: Request) => handleModels(req, getServices())

export const config: Config = {
  path: "/api/models",
}
