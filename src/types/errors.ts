/**
 * Raised when SABnzbd cannot be reached or answers with an error.
 * A sync cycle that sees this error aborts without writing anything.
 */
export class DownloadClientError extends Error {
  readonly statusCode?: number

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'DownloadClientError'
    this.statusCode = options?.statusCode
  }
}

/**
 * Raised when a Radarr/Sonarr library request fails
 */
export class LibraryLookupError extends Error {
  readonly instanceName: string
  readonly statusCode?: number

  constructor(
    instanceName: string,
    message: string,
    options?: { statusCode?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause })
    this.name = 'LibraryLookupError'
    this.instanceName = instanceName
    this.statusCode = options?.statusCode
  }
}

/**
 * Raised for a priority label or code outside the canonical table
 */
export class PriorityValidationError extends Error {
  readonly value: unknown

  constructor(value: unknown) {
    super(`Unrecognized priority value: ${JSON.stringify(value)}`)
    this.name = 'PriorityValidationError'
    this.value = value
  }
}

export interface HealthCheckResult {
  /** Whether the service is reachable and responding */
  healthy: boolean
  /** Error message if unhealthy */
  error?: string
}
