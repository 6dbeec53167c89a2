/**
 * In-memory stack metadata catalog
 */

import { CatalogLookupError } from '../errors.js';
import { formatStackId } from '../upgrade/stack.js';
import type { StackId } from '../upgrade/types.js';
import type { MetadataCatalog } from './types.js';

export interface CatalogComponent {
  name: string;
  displayName?: string;
  /** Component reports its own version */
  advertiseVersion: boolean;
}

export interface CatalogService {
  name: string;
  displayName?: string;
  components: CatalogComponent[];
}

/** Stack id (`NAME-VERSION`) → services it defines */
export type CatalogDefinition = Record<string, CatalogService[]>;

export class InMemoryCatalog implements MetadataCatalog {
  constructor(private readonly definition: CatalogDefinition) {}

  getDisplayName(stackId: StackId, serviceName: string): string {
    const service = this.service(stackId, serviceName);
    return service.displayName ?? service.name;
  }

  getComponentDisplayName(stackId: StackId, serviceName: string, componentName: string): string {
    const component = this.component(stackId, serviceName, componentName);
    return component.displayName ?? component.name;
  }

  isVersionAdvertised(stackId: StackId, serviceName: string, componentName: string): boolean {
    return this.component(stackId, serviceName, componentName).advertiseVersion;
  }

  private service(stackId: StackId, serviceName: string): CatalogService {
    const stack = formatStackId(stackId);
    const services = this.definition[stack];
    if (!services) {
      throw new CatalogLookupError(`Stack ${stack} is not defined`, stack);
    }
    const service = services.find((s) => s.name === serviceName);
    if (!service) {
      throw new CatalogLookupError(`Service ${serviceName} is not defined in ${stack}`, `${stack}/${serviceName}`);
    }
    return service;
  }

  private component(stackId: StackId, serviceName: string, componentName: string): CatalogComponent {
    const component = this.service(stackId, serviceName).components.find((c) => c.name === componentName);
    if (!component) {
      const path = `${formatStackId(stackId)}/${serviceName}/${componentName}`;
      throw new CatalogLookupError(`Component ${componentName} is not defined for ${serviceName}`, path);
    }
    return component;
  }
}
