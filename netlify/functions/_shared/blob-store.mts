/**
 * Ledgerwise - Netlify Blobs document store
 */

import { getStore } from "@netlify/blobs"
import type { DocumentStore, Parser } from "../../../src/engine/persistence.ts"

type BlobStore = ReturnType<typeof getStore>

export class BlobDocumentStore implements DocumentStore {
  private store: BlobStore

  constructor(name: string) {
    this.store = getStore(name, { consistency: "strong" })
  }

  async getJSON<T>(key: string, parse: Parser<T>): Promise<T | null> {
    const value: unknown = await this.store.get(key, { type: "json" })
    if (value === null || value === undefined) return null
    return parse(value)
  }

  async setJSON(key: string, value: unknown): Promise<void> {
    await this.store.setJSON(key, value)
  }

  async createJSON(key: string, value: unknown): Promise<boolean> {
    const { modified } = await this.store.setJSON(key, value, { onlyIfNew: true })
    return modified
  }

  async list(prefix: string): Promise<string[]> {
    const { blobs } = await this.store.list({ prefix })
    return blobs.map(b => b.key).sort()
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key)
  }
}
