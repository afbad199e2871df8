/**
 * Ledgerwise - Browser Document Store
 *
 * DocumentStore over localStorage, used by local-only mode. Keys are
 * namespaced so other data on the origin is never listed or touched.
 */

import type { DocumentStore, Parser } from './persistence'

/** The parts of the Web Storage API the store needs */
export type WebStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem' | 'key' | 'length'>

const NAMESPACE = 'ledgerwise:doc:'

export class BrowserDocumentStore implements DocumentStore {
  constructor(private storage: WebStorage, private namespace = NAMESPACE) {}

  async getJSON<T>(key: string, parse: Parser<T>): Promise<T | null> {
    const raw = this.storage.getItem(this.namespace + key)
    if (raw === null) return null
    return parse(JSON.parse(raw))
  }

  async setJSON(key: string, value: unknown): Promise<void> {
    // Quota errors propagate to the caller
    this.storage.setItem(this.namespace + key, JSON.stringify(value))
  }

  async createJSON(key: string, value: unknown): Promise<boolean> {
    if (this.storage.getItem(this.namespace + key) !== null) return false
    this.storage.setItem(this.namespace + key, JSON.stringify(value))
    return true
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = []
    for (let i = 0; i < this.storage.length; i++) {
      const full = this.storage.key(i)
      if (full?.startsWith(this.namespace + prefix)) keys.push(full.slice(this.namespace.length))
    }
    return keys.sort()
  }

  async delete(key: string): Promise<void> {
    this.storage.removeItem(this.namespace + key)
  }
}

/** localStorage when it is usable, or null (private mode, storage disabled) */
export function probeLocalStorage(): WebStorage | null {
  try {
    const testKey = '__ledgerwise_storage_test__'
    localStorage.setItem(testKey, '1')
    localStorage.removeItem(testKey)
    return localStorage
  } catch {
    // Access itself throws when storage is blocked
    return null
  }
}
