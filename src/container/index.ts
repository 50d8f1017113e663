/**
 * @fileoverview Composition root. Registers configuration, the structure data
 * provider and the structure finder service with the tsyringe container.
 * @module src/container/index
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config as appConfig, type AppConfig as AppConfigType } from '@/config/index.js';
import { RcsbStructureProvider } from '@/services/structure-finder/providers/rcsb.provider.js';
import { StructureFinderService as StructureFinderServiceClass } from '@/services/structure-finder/core/StructureFinderService.js';
import { AppConfig, StructureDataProvider, StructureFinderService } from './tokens.js';

let registered = false;

export function composeContainer(config: AppConfigType = appConfig): void {
  if (registered) return;

  container.register(AppConfig, { useValue: config });
  container.registerSingleton(StructureDataProvider, RcsbStructureProvider);
  container.registerSingleton(StructureFinderService, StructureFinderServiceClass);

  registered = true;
}

export { container };
