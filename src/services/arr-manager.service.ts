import type { FastifyBaseLogger } from 'fastify'
import type {
  ArrInstance,
  ArrInstanceConfig,
  ArrLibraryOptions,
  ArrType,
} from '@root/types/arr.types.js'
import { systemClock, type Clock } from '@root/types/scheduler.types.js'
import { ArrLibraryService } from '@services/arr-library.service.js'

export interface ArrManagerConfig extends ArrLibraryOptions {
  radarrInstances: ArrInstanceConfig[]
  sonarrInstances: ArrInstanceConfig[]
}

/**
 * Routes SABnzbd categories to Radarr/Sonarr instances.
 *
 * The category map is static: it is built once from config, and two
 * instances claiming the same category is a configuration error.
 */
export class ArrManagerService {
  private readonly byCategory = new Map<string, ArrLibraryService>()
  private readonly services: ArrLibraryService[] = []

  constructor(
    private readonly log: FastifyBaseLogger,
    config: ArrManagerConfig,
    clock: Clock = systemClock,
  ) {
    const instances: ArrInstance[] = [
      ...config.radarrInstances.map((i) => withType(i, 'radarr')),
      ...config.sonarrInstances.map((i) => withType(i, 'sonarr')),
    ]

    for (const instance of instances) {
      const service = new ArrLibraryService(log, instance, config, clock)
      this.services.push(service)

      if (!instance.category) {
        this.log.warn(
          { instance: instance.name },
          'Instance has no category and will never be used for matching',
        )
        continue
      }

      const existing = this.byCategory.get(instance.category)
      if (existing) {
        throw new Error(
          `Category "${instance.category}" is assigned to both "${existing.instance.name}" and "${instance.name}"`,
        )
      }
      this.byCategory.set(instance.category, service)
      this.log.info(
        { instance: instance.name, type: instance.type, category: instance.category },
        'Registered library instance',
      )
    }
  }

  /**
   * @returns The instance that handles this SABnzbd category, or null
   */
  getInstanceForCategory(
    category: string | null | undefined,
  ): ArrLibraryService | null {
    if (!category) return null
    return this.byCategory.get(category) ?? null
  }

  getInstances(): ArrInstance[] {
    return this.services.map((service) => service.instance)
  }

  /**
   * Drops every cached library, e.g. before a forced rematch
   */
  invalidateCaches(): void {
    for (const service of this.services) {
      service.invalidateCache()
    }
  }
}

function withType(config: ArrInstanceConfig, type: ArrType): ArrInstance {
  return { ...config, type }
}
