import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface StreamLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | pino.MultiStreamRes
}

export type AppLoggerOptions = LoggerOptions | StreamLoggerOptions

type Serializable = Error | Record<string, unknown> | string | number | boolean

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/** Query parameters whose values never reach the logs */
const REDACTED_PARAMS = ['apikey', 'api_key', 'token', 'password']

/**
 * Serializes errors, HttpErrors and thrown primitives. Stack traces are kept
 * for 5xx and untyped errors only, and `cause` chains are followed.
 */
export function serializeError(err: Serializable): unknown {
  if (err == null) {
    return err
  }

  if (typeof err !== 'object') {
    return { message: String(err), type: `${typeof err}Error` }
  }

  const serialized: Record<string, unknown> = {}
  if ('message' in err && err.message) serialized.message = err.message
  if ('name' in err && err.name) serialized.name = err.name
  if ('statusCode' in err && err.statusCode !== undefined) {
    serialized.statusCode = err.statusCode
  }
  serialized.type =
    err instanceof Error ? err.constructor.name || 'Error' : 'UnknownError'

  const statusCode =
    'statusCode' in err && typeof err.statusCode === 'number'
      ? err.statusCode
      : undefined
  if ('stack' in err && err.stack && (!statusCode || statusCode >= 500)) {
    serialized.stack = err.stack
  }

  if ('cause' in err && err.cause) {
    const cause = err.cause
    serialized.cause =
      cause instanceof Error ||
      typeof cause === 'string' ||
      typeof cause === 'number' ||
      typeof cause === 'boolean'
        ? serializeError(cause)
        : String(cause)
  }

  for (const [key, value] of Object.entries(err)) {
    if (!['message', 'stack', 'name', 'statusCode', 'type', 'cause'].includes(key)) {
      serialized[key] = value
    }
  }

  return serialized
}

/**
 * Replaces the values of sensitive query parameters in a URL
 *
 * @example
 * redactUrl('/api?mode=queue&apikey=test-secret') // '/api?mode=queue&apikey=[REDACTED]'
 */
export function redactUrl(url: string): string {
  return REDACTED_PARAMS.reduce(
    (result, param) =>
      result.replace(
        new RegExp(`([?&])(${param})=([^&]+)`, 'gi'),
        '$1$2=[REDACTED]',
      ),
    url,
  )
}

function serializeRequest(req: FastifyRequest) {
  return {
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  }
}

const serializers = {
  req: serializeRequest,
  err: serializeError,
  error: serializeError,
}

/**
 * `queuearr-current.log` for the live file, `queuearr-YYYY-MM-DD[-n].log`
 * once rotated
 */
export function logFilename(time: number | Date, index?: number): string {
  if (!time) return 'queuearr-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `queuearr-${year}-${month}-${day}${index ? `-${index}` : ''}.log`
}

function getFileStream(): rfs.RotatingFileStream | null {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    fs.mkdirSync(logDirectory, { recursive: true })
    return rfs.createStream(logFilename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to set up log directory:', err)
    return null
  }
}

/**
 * Builds the Fastify logger options from the environment.
 *
 * - `enableConsoleOutput` (default true): pretty output on the terminal
 * - `enableFileLogging` (default false): rotating files under data/logs
 */
export function createLoggerConfig(): AppLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const enableFileLogging = process.env.enableFileLogging === 'true'
  const fileStream = enableFileLogging ? getFileStream() : null

  if (!fileStream) {
    return enableConsoleOutput
      ? {
          level: 'info',
          transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
          serializers,
        }
      : { level: 'info', serializers }
  }

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers,
  }
}
