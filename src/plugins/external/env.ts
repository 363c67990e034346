import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import { ArrInstanceConfigSchema } from '@root/types/arr.types.js'
import type { Config, RawConfig } from '@root/types/config.types.js'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3005,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    dbPath: {
      type: 'string',
      default: './data/db/queuearr.db',
    },
    // SABnzbd
    sabnzbdUrl: {
      type: 'string',
      default: 'http://localhost:8080',
    },
    sabnzbdApiKey: {
      type: 'string',
      default: '',
    },
    historyLimit: {
      type: 'number',
      default: 100,
    },
    requestTimeoutMs: {
      type: 'number',
      default: 10000,
    },
    // Library instances, JSON arrays of { name, baseUrl, apiKey, category }
    radarrInstances: {
      type: 'string',
      default: '[]',
    },
    sonarrInstances: {
      type: 'string',
      default: '[]',
    },
    libraryCacheTtlSeconds: {
      type: 'number',
      default: 300,
    },
    // Sync
    syncIntervalSeconds: {
      type: 'number',
      default: 5,
      minimum: 1,
    },
    missingCycleThreshold: {
      type: 'number',
      default: 3,
      minimum: 1,
    },
    // Media matching
    maxConcurrentLookups: {
      type: 'number',
      default: 3,
      minimum: 1,
    },
    matchThreshold: {
      type: 'number',
      default: 60,
      minimum: 0,
      maximum: 100,
    },
    // Retention
    retentionHours: {
      type: 'number',
      default: 48,
      minimum: 0,
    },
    retentionIntervalMinutes: {
      type: 'number',
      default: 60,
      minimum: 1,
    },
  },
}

const InstanceListSchema = z.array(ArrInstanceConfigSchema)

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const rawConfig = fastify.config as unknown as RawConfig

    // Helper function to safely parse JSON with error handling
    const safeJsonParse = (value: string | undefined, fieldName: string): unknown => {
      if (!value) return []
      try {
        return JSON.parse(value)
      } catch (error) {
        fastify.log.warn(
          { error },
          `Failed to parse ${fieldName} config, using default`,
        )
        return []
      }
    }

    const parseInstances = (value: string, fieldName: string) => {
      const result = InstanceListSchema.safeParse(safeJsonParse(value, fieldName))
      if (!result.success) {
        throw new Error(
          `Invalid ${fieldName} config: ${result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')}`,
        )
      }
      return result.data
    }

    const parsedConfig: Config = {
      ...rawConfig,
      radarrInstances: parseInstances(rawConfig.radarrInstances, 'radarrInstances'),
      sonarrInstances: parseInstances(rawConfig.sonarrInstances, 'sonarrInstances'),
    }

    if (!parsedConfig.sabnzbdApiKey) {
      fastify.log.warn('sabnzbdApiKey is not set; SABnzbd requests will be rejected')
    }

    fastify.config = parsedConfig
  },
  {
    name: 'config',
  },
)
