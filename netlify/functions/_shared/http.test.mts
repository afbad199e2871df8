import { describe, it, expect } from "vitest"
import { z } from "zod"
import { ScoringError, TrainingError, UpstreamError, ValidationError } from "../../../src/engine/errors.ts"
import { silentLogger } from "../../../src/engine/logger.ts"
import { errorResponse, readBody } from "./http.mts"

async function statusAndBody(res: Response) {
  return { status: res.status, body: await res.json() }
}

describe("errorResponse", () => {
  it("maps validation errors to 400 with the fields", async () => {
    const { status, body } = await statusAndBody(errorResponse(new ValidationError("bad", ["income"]), silentLogger))
    expect(status).toBe(400)
    expect(body).toEqual({ error: true, message: "bad", code: "VALIDATION_ERROR", fields: ["income"] })
  })

  it("maps scoring and training errors to 422", async () => {
    const scoring = await statusAndBody(errorResponse(new ScoringError("nope", ["ageFactor"]), silentLogger))
    expect(scoring.status).toBe(422)
    expect(scoring.body.features).toEqual(["ageFactor"])

    const training = await statusAndBody(errorResponse(new TrainingError("Sample 2: bad", 2), silentLogger))
    expect(training.status).toBe(422)
    expect(training.body.code).toBe("TRAINING_ERROR")
    expect(training.body.sampleIndex).toBe(2)
  })

  it("maps upstream failures to 503 without leaking the cause", async () => {
    const { status, body } = await statusAndBody(
      errorResponse(new UpstreamError("read profile:u timed out after 5000ms", "store", "timeout"), silentLogger),
    )
    expect(status).toBe(503)
    expect(body).toEqual({
      error: true,
      message: "The data store is unavailable right now",
      code: "UPSTREAM_ERROR",
      service: "store",
      reason: "timeout",
    })
  })

  it("hides unexpected errors", async () => {
    const { status, body } = await statusAndBody(errorResponse(new Error("secret detail"), silentLogger))
    expect(status).toBe(500)
    expect(body.message).toBe("Internal server error")
  })
})

describe("readBody", () => {
  const schema = z.object({ question: z.string().min(1) })
  const post = (body: string) => new Request("http://localhost/api", { method: "POST", body })

  it("returns the parsed body", async () => {
    await expect(readBody(post('{"question":"hi"}'), schema)).resolves.toEqual({ question: "hi" })
  })

  it("rejects invalid JSON", async () => {
    const e = await readBody(post("{"), schema).catch((err: unknown) => err)
    expect(e).toBeInstanceOf(ValidationError)
    if (e instanceof ValidationError) expect(e.fields).toEqual(["body"])
  })

  it("names the mismatched fields", async () => {
    const e = await readBody(post('{"question":""}'), schema).catch((err: unknown) => err)
    expect(e).toBeInstanceOf(ValidationError)
    if (e instanceof ValidationError) expect(e.fields).toEqual(["question"])
  })
})
