import { Injectable } from '@nestjs/common';
import { AccessScope, CollectionId, ROLE_COLLECTIONS, Role } from './types';

const ROLES: readonly string[] = Object.values(Role);
const COLLECTIONS: readonly string[] = Object.values(CollectionId);

export function isRole(value: string): value is Role {
    return ROLES.includes(value);
}

export function isCollectionId(value: string): value is CollectionId {
    return COLLECTIONS.includes(value);
}

/** Matches a collection tag recorded by an index, ignoring case. */
export function parseCollectionTag(tag: string): CollectionId | null {
    const lower = tag.trim().toLowerCase();
    return Object.values(CollectionId).find(id => id.toLowerCase() === lower) ?? null;
}

export function accessScope(role: Role): AccessScope {
    return Object.freeze({ role, collections: Object.freeze([...ROLE_COLLECTIONS[role]]) });
}

export function inScope(scope: AccessScope, collection: string): boolean {
    return isCollectionId(collection) && scope.collections.includes(collection);
}

@Injectable()
export class AccessScopeService {

    resolve(role: Role): AccessScope {
        return accessScope(role);
    }
}
