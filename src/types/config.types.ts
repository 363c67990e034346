import type { ArrInstanceConfig } from '@root/types/arr.types.js'

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  dbPath: string
  // SABnzbd
  sabnzbdUrl: string
  sabnzbdApiKey: string
  historyLimit: number
  requestTimeoutMs: number
  // Library instances, routed by SABnzbd category
  radarrInstances: ArrInstanceConfig[]
  sonarrInstances: ArrInstanceConfig[]
  libraryCacheTtlSeconds: number
  // Sync
  syncIntervalSeconds: number
  missingCycleThreshold: number
  // Media matching
  maxConcurrentLookups: number
  matchThreshold: number
  // Retention
  retentionHours: number
  retentionIntervalMinutes: number
}

/**
 * Config as read from the environment, before JSON fields are parsed
 */
export type RawConfig = {
  [K in keyof Config]: Config[K] extends ArrInstanceConfig[] ? string : Config[K]
}
