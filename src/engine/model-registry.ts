/**
 * Ledgerwise - Model Registry
 *
 * Append-only, versioned storage for scoring artifacts. Published versions
 * are never rewritten; callers resolve an artifact once per request and
 * score against that frozen copy.
 */

import { z } from 'zod'
import { ScoringError } from './errors'
import { silentLogger } from './logger'
import type { Logger } from './logger'
import type { DocumentStore } from './persistence'
import { BASELINE_MODEL, freezeArtifact } from './scoring'
import { FEATURE_NAMES } from './types'
import type { ModelArtifact, ModelDraft } from './types'

const MODEL_PREFIX = 'model:'
const MAX_PUBLISH_ATTEMPTS = 5

export const modelKey = (version: number) => `${MODEL_PREFIX}${String(version).padStart(6, '0')}`

const linearModelSchema = z.object({
  intercept: z.number().finite(),
  weights: z.array(z.number().finite()).length(FEATURE_NAMES.length),
})

export const modelArtifactSchema = z.object({
  version: z.number().int().min(0),
  kind: z.enum(['baseline', 'trained']),
  createdAt: z.string(),
  features: z.array(z.enum(FEATURE_NAMES)),
  risk: linearModelSchema,
  readiness: linearModelSchema,
  metrics: z.object({
    samples: z.number().int().min(1),
    riskMse: z.number(),
    readinessMse: z.number(),
  }).optional(),
})

function parseArtifact(value: unknown): ModelArtifact {
  const result = modelArtifactSchema.safeParse(value)
  if (!result.success) {
    throw new ScoringError(`Stored model artifact is corrupt: ${result.error.issues[0]?.message ?? 'unknown'}`)
  }
  const features = result.data.features
  if (features.join(',') !== FEATURE_NAMES.join(',')) {
    throw new ScoringError(`Model ${result.data.version} was trained on a different feature set`)
  }
  return freezeArtifact(result.data)
}

export class ModelRegistry {
  constructor(
    private store: DocumentStore,
    private log: Logger = silentLogger,
    private now: () => Date = () => new Date(),
  ) {}

  /** Published versions, ascending. Version 0 (baseline) is implicit. */
  async versions(): Promise<number[]> {
    const keys = await this.store.list(MODEL_PREFIX)
    return keys
      .map(k => Number(k.slice(MODEL_PREFIX.length)))
      .filter(v => Number.isInteger(v) && v > 0)
      .sort((a, b) => a - b)
  }

  async get(version: number): Promise<ModelArtifact | null> {
    if (version === 0) return BASELINE_MODEL
    return this.store.getJSON(modelKey(version), parseArtifact)
  }

  /** Newest published artifact, or the baseline when nothing is published */
  async latest(): Promise<ModelArtifact> {
    const versions = await this.versions()
    const newest = versions[versions.length - 1]
    if (newest === undefined) return BASELINE_MODEL
    return (await this.get(newest)) ?? BASELINE_MODEL
  }

  async publish(draft: ModelDraft): Promise<ModelArtifact> {
    const versions = await this.versions()
    let version = (versions[versions.length - 1] ?? 0) + 1

    for (let attempt = 0; attempt < MAX_PUBLISH_ATTEMPTS; attempt++, version++) {
      const artifact: ModelArtifact = {
        ...draft,
        version,
        createdAt: this.now().toISOString(),
      }
      if (!(await this.store.createJSON(modelKey(version), artifact))) {
        this.log.warn(`model v${version} was taken by another publish, trying v${version + 1}`)
        continue
      }
      this.log.info(`published model v${version}`, draft.metrics ?? {})
      return parseArtifact(JSON.parse(JSON.stringify(artifact)))
    }
    throw new ScoringError('Could not allocate a model version')
  }
}
