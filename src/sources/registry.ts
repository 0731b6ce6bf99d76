/**
 * Builds the source registry from configuration. Adding a source kind means
 * adding a factory here; the aggregator only sees the registry.
 */

import type { SourceKind } from '../types';
import type { SourceConfig, SystemConfig } from '../config/schema';
import { logger } from '../lib/logger';
import { createApiSource } from './api-source';
import { createMockSource } from './mock-source';
import { createWebSource } from './web-source';
import { SourceRegistry, type SourceAdapter, type SourceFactoryOptions } from './base';

export type SourceFactory = (
  name: string,
  config: SourceConfig,
  options: SourceFactoryOptions
) => SourceAdapter;

export const SOURCE_FACTORIES: Record<SourceKind, SourceFactory> = {
  api: createApiSource,
  web: createWebSource,
  mock: createMockSource,
};

const log = logger.child({ component: 'source-registry' });

export function createSourceRegistry(
  sources: SystemConfig['sources'],
  options: SourceFactoryOptions = {},
  factories: Record<SourceKind, SourceFactory> = SOURCE_FACTORIES
): SourceRegistry {
  const registry = new SourceRegistry();

  for (const [name, config] of Object.entries(sources)) {
    registry.register(factories[config.kind](name, config, options));
  }

  log.info('Sources configured', {
    total: registry.size,
    enabled: registry.select().map(adapter => adapter.descriptor.name),
  });
  return registry;
}
