/**
 * Resource database
 * Index over every resource definition visible in one schema tree
 */

import { ResourceDefinition, ResourceIndex } from './descriptors';

/**
 * Strip the trailing `collection/{id}` pair from a resource pattern.
 * Returns undefined for top-level patterns, which have no parent.
 */
export function getParentPattern(pattern: string): string | undefined {
  const segments = pattern.split('/');
  if (segments.length <= 2) {
    return undefined;
  }
  return segments.slice(0, -2).join('/');
}

export class ResourceDatabase implements ResourceIndex {
  private byType = new Map<string, ResourceDefinition[]>();
  private byPattern = new Map<string, ResourceDefinition[]>();

  /**
   * Register a resource. Registering an identical type/pattern set twice is a no-op.
   */
  registerResource(resource: ResourceDefinition): void {
    const existing = this.byType.get(resource.type) ?? [];
    if (existing.some(known => samePatterns(known.patterns, resource.patterns))) {
      return;
    }
    existing.push(resource);
    this.byType.set(resource.type, existing);

    for (const pattern of resource.patterns) {
      const list = this.byPattern.get(pattern) ?? [];
      list.push(resource);
      this.byPattern.set(pattern, list);
    }
  }

  registerResources(resources: Iterable<ResourceDefinition>): void {
    for (const resource of resources) {
      this.registerResource(resource);
    }
  }

  getResourceByType(type: string): readonly ResourceDefinition[] {
    return this.byType.get(type) ?? [];
  }

  getResourcesByPattern(pattern: string): readonly ResourceDefinition[] {
    return this.byPattern.get(pattern) ?? [];
  }

  /**
   * Resources whose pattern is the parent of one of the child type's patterns.
   * `child_type: "pubsub.googleapis.com/Topic"` with pattern
   * `projects/{project}/topics/{topic}` resolves to resources declaring `projects/{project}`.
   */
  getParentResourcesByChildType(childType: string): readonly ResourceDefinition[] {
    const parents: ResourceDefinition[] = [];
    for (const child of this.getResourceByType(childType)) {
      for (const pattern of child.patterns) {
        const parentPattern = getParentPattern(pattern);
        if (!parentPattern) {
          continue;
        }
        for (const parent of this.getResourcesByPattern(parentPattern)) {
          if (!parents.includes(parent)) {
            parents.push(parent);
          }
        }
      }
    }
    return parents;
  }

  get size(): number {
    let count = 0;
    for (const list of this.byType.values()) {
      count += list.length;
    }
    return count;
  }
}

function samePatterns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((pattern, i) => pattern === b[i]);
}
