// src/store/resourceStore.ts

import { Resource } from '../models/Resource';

/**
 * What the registration engine needs from a resource collection
 */
export interface ResourceStore {
    get(resourceId: string): Resource | undefined;
    capacity(resourceId: string): number;
    list(): Resource[];
}

/**
 * Store over a live Map - mutations through returned resources are visible
 */
export class InMemoryResourceStore implements ResourceStore {
    private resources: Map<string, Resource>;

    constructor(resources: Map<string, Resource> = new Map()) {
        this.resources = resources;
    }

    get(resourceId: string): Resource | undefined {
        return this.resources.get(resourceId);
    }

    /**
     * @returns 0 for unknown resources
     */
    capacity(resourceId: string): number {
        return this.resources.get(resourceId)?.capacity ?? 0;
    }

    list(): Resource[] {
        return Array.from(this.resources.values());
    }
}
