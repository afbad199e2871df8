import { describe, it, expect, beforeEach } from 'vitest'
import { ScoringError } from './errors'
import { ModelRegistry, modelKey } from './model-registry'
import { MemoryDocumentStore } from './persistence'
import { BASELINE_MODEL } from './scoring'
import { FEATURE_NAMES } from './types'
import type { ModelDraft } from './types'

function draft(intercept: number): ModelDraft {
  return {
    kind: 'trained',
    features: FEATURE_NAMES,
    risk: { intercept, weights: [0, 0.1, 0, -0.1, 0.2, 0, 0] },
    readiness: { intercept: 0.5, weights: [0.3, -0.1, 0, 0.1, -0.1, -0.1, 0] },
    metrics: { samples: 10, riskMse: 0.01, readinessMse: 0.02 },
  }
}

describe('model registry', () => {
  let store: MemoryDocumentStore
  let registry: ModelRegistry

  beforeEach(() => {
    store = new MemoryDocumentStore()
    registry = new ModelRegistry(store, undefined, () => new Date('2026-01-15T10:00:00.000Z'))
  })

  it('falls back to the baseline when nothing is published', async () => {
    expect(await registry.latest()).toBe(BASELINE_MODEL)
    expect(await registry.versions()).toEqual([])
    expect(await registry.get(0)).toBe(BASELINE_MODEL)
  })

  it('assigns increasing versions', async () => {
    const first = await registry.publish(draft(0.2))
    const second = await registry.publish(draft(0.3))
    expect(first.version).toBe(1)
    expect(second.version).toBe(2)
    expect(second.createdAt).toBe('2026-01-15T10:00:00.000Z')
    expect(await registry.versions()).toEqual([1, 2])
    expect((await registry.latest()).risk.intercept).toBe(0.3)
  })

  it('leaves earlier versions untouched by later publishes', async () => {
    await registry.publish(draft(0.2))
    const inFlight = await registry.latest()
    await registry.publish(draft(0.9))

    expect(inFlight.version).toBe(1)
    expect(inFlight.risk.intercept).toBe(0.2)
    expect((await registry.get(1))?.risk.intercept).toBe(0.2)
    expect(store.size).toBe(2)
  })

  it('gives concurrent publishes distinct versions', async () => {
    const [a, b] = await Promise.all([registry.publish(draft(0.2)), registry.publish(draft(0.7))])

    expect([a.version, b.version].sort()).toEqual([1, 2])
    expect((await registry.get(a.version))?.risk.intercept).toBe(0.2)
    expect((await registry.get(b.version))?.risk.intercept).toBe(0.7)
    expect(await registry.versions()).toEqual([1, 2])
    expect(store.size).toBe(2)
  })

  it('serves frozen artifacts', async () => {
    const artifact = await registry.publish(draft(0.2))
    expect(Object.isFrozen(artifact)).toBe(true)
    expect(Object.isFrozen(artifact.risk.weights)).toBe(true)
  })

  it('returns null for an unknown version', async () => {
    expect(await registry.get(7)).toBeNull()
  })

  it('raises ScoringError for a corrupt artifact', async () => {
    await store.setJSON(modelKey(3), { version: 3, kind: 'trained', risk: { intercept: 'x' } })
    await expect(registry.get(3)).rejects.toBeInstanceOf(ScoringError)
  })

  it('pads version keys so they sort numerically', () => {
    expect(modelKey(12)).toBe('model:000012')
  })
})
