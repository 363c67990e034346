import { z } from 'zod'
import type { MediaType } from '@root/types/download.types.js'

export type ArrType = 'radarr' | 'sonarr'

export const ArrInstanceConfigSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  category: z.string().min(1).nullable().optional(),
})

export type ArrInstanceConfig = z.infer<typeof ArrInstanceConfigSchema>

export interface ArrInstance extends ArrInstanceConfig {
  type: ArrType
}

export const ArrImageSchema = z
  .object({
    coverType: z.string(),
    url: z.string().nullable().optional(),
    remoteUrl: z.string().nullable().optional(),
  })
  .passthrough()

/**
 * Shared subset of a Radarr movie and a Sonarr series resource
 */
export const ArrLibraryItemSchema = z
  .object({
    id: z.number(),
    title: z.string(),
    year: z.number().nullable().optional(),
    images: z.array(ArrImageSchema).optional(),
  })
  .passthrough()

export const ArrLibraryResponseSchema = z.array(ArrLibraryItemSchema)

export type ArrImage = z.infer<typeof ArrImageSchema>
export type ArrLibraryItem = z.infer<typeof ArrLibraryItemSchema>

export interface ArrLibraryOptions {
  cacheTtlSeconds: number
  requestTimeoutMs: number
}

export interface LibraryCandidate {
  title: string
  year: number | null
  type: MediaType
  posterUrl: string | null
}

export interface MediaLookupResult {
  mediaTitle: string
  mediaType: MediaType
  year: number | null
  posterUrl: string | null
  sourceInstance: string
  score: number
}
