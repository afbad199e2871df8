/**
 * Ledgerwise - Error Taxonomy
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public fields: string[],
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class ScoringError extends Error {
  constructor(
    message: string,
    public features: string[] = [],
  ) {
    super(message)
    this.name = 'ScoringError'
  }
}

export class TrainingError extends Error {
  constructor(
    message: string,
    public sampleIndex?: number,
  ) {
    super(message)
    this.name = 'TrainingError'
  }
}

export type UpstreamService = 'advisor' | 'store'
export type UpstreamReason = 'timeout' | 'quota' | 'http' | 'network' | 'malformed' | 'config'

/** An external service (language model or document store) failed */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public service: UpstreamService,
    public reason: UpstreamReason,
    public status?: number,
  ) {
    super(message)
    this.name = 'UpstreamError'
  }

  /** Transient failures that a bounded retry may clear */
  get retryable(): boolean {
    return this.reason === 'timeout' || this.reason === 'network' || this.reason === 'quota'
      || (this.reason === 'http' && this.status !== undefined && this.status >= 500)
  }
}
