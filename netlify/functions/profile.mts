/**
 * Ledgerwise - Profile API (Netlify Serverless Function)
 *
 *   GET      - stored profile, or null
 *   PUT/POST - validate and save the profile
 */

import type { Config } from "@netlify/functions"
import { z } from "zod"
import { validateProfile } from "../../src/engine/validation.ts"
import { error, errorResponse, json, readBody } from "./_shared/http.mts"
import { authenticate, getServices } from "./_shared/services.mts"
import type { RequestContext, Services } from "./_shared/services.mts"

const saveSchema = z.object({ profile: z.unknown() })

async function handleGet(ctx: RequestContext): Promise<Response> {
  const profile = await ctx.services.profiles.getProfile(ctx.userId)
  return json({ profile })
}

async function handleSave(req: Request, ctx: RequestContext): Promise<Response> {
  const { profile } = await readBody(req, saveSchema)

  const result = validateProfile(profile)
  if (!result.valid) {
    return error("Profile is invalid", 400, "VALIDATION_ERROR", {
      fields: result.errors.map(e => e.path),
      errors: result.errors,
    })
  }

  const saved = await ctx.services.profiles.putProfile(ctx.userId, result.data)
  return json({ success: true, profile: saved, warnings: result.warnings })
}

export async function handleProfile(req: Request, services: Services): Promise<Response> {
  const log = services.logger("Profile")
  try {
    const ctx = await authenticate(req, services, "Profile")
    if (!ctx) return error("Not authenticated", 401, "AUTH_REQUIRED")

    switch (req.method) {
      case "GET":
        return await handleGet(ctx)
      case "PUT":
      case "POST":
        return await handleSave(req, ctx)
      default:
        return error(`Method ${req.method} not allowed`, 405)
    }
  } catch (e) {
    return errorResponse(e, log)
  }
}

export default async (req: Request) => handleProfile(req, getServices())

export const config: Config = {
  path: "/api/profile",
}
