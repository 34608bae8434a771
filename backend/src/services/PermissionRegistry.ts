import { Capability } from '../../../shared/types';

export type Permission = 'READ' | 'WRITE' | 'COMMENT' | 'OWNER';

/**
 * The permission collaborator the sync controller consults once per
 * submitted operation.
 */
export interface PermissionProvider {
  hasCapability(clientId: string, capability: Capability): boolean | Promise<boolean>;
}

const CAPABILITIES: Record<Permission, readonly Capability[]> = {
  READ: ['read'],
  COMMENT: ['read', 'comment'],
  WRITE: ['read', 'write', 'comment'],
  OWNER: ['read', 'write', 'comment']
};

/**
 * In-memory grants for a single document. Clients without a grant can read.
 */
export class PermissionRegistry implements PermissionProvider {
  private grants: Map<string, Permission> = new Map();

  constructor(ownerId?: string, private readonly defaultPermission: Permission = 'READ') {
    if (ownerId) {
      this.grants.set(ownerId, 'OWNER');
    }
  }

  grant(clientId: string, permission: Permission): void {
    this.grants.set(clientId, permission);
  }

  revoke(clientId: string): void {
    if (this.grants.get(clientId) !== 'OWNER') {
      this.grants.delete(clientId);
    }
  }

  hasGrant(clientId: string): boolean {
    return this.grants.has(clientId);
  }

  permissionOf(clientId: string): Permission {
    return this.grants.get(clientId) || this.defaultPermission;
  }

  capabilitiesOf(clientId: string): Set<Capability> {
    return new Set(CAPABILITIES[this.permissionOf(clientId)]);
  }

  canEdit(clientId: string): boolean {
    return this.hasCapability(clientId, 'write');
  }

  hasCapability(clientId: string, capability: Capability): boolean {
    return CAPABILITIES[this.permissionOf(clientId)].includes(capability);
  }
}
