import { PermissionRegistry } from '../PermissionRegistry';

describe('PermissionRegistry', () => {
  let permissions: PermissionRegistry;

  beforeEach(() => {
    permissions = new PermissionRegistry('owner');
  });

  test('should give the owner every capability', () => {
    expect(permissions.permissionOf('owner')).toBe('OWNER');
    expect([...permissions.capabilitiesOf('owner')].sort()).toEqual(['comment', 'read', 'write']);
  });

  test('should let unknown clients read only', () => {
    expect(permissions.hasGrant('stranger')).toBe(false);
    expect(permissions.hasCapability('stranger', 'read')).toBe(true);
    expect(permissions.canEdit('stranger')).toBe(false);
  });

  test('should map each permission to its capabilities', () => {
    permissions.grant('writer', 'WRITE');
    permissions.grant('commenter', 'COMMENT');

    expect(permissions.canEdit('writer')).toBe(true);
    expect(permissions.hasCapability('commenter', 'comment')).toBe(true);
    expect(permissions.hasCapability('commenter', 'write')).toBe(false);
  });

  test('should revoke grants but never the owner', () => {
    permissions.grant('writer', 'WRITE');

    permissions.revoke('writer');
    permissions.revoke('owner');

    expect(permissions.permissionOf('writer')).toBe('READ');
    expect(permissions.permissionOf('owner')).toBe('OWNER');
  });

  test('should use the configured default for clients without a grant', () => {
    const open = new PermissionRegistry(undefined, 'WRITE');

    expect(open.canEdit('anyone')).toBe(true);
  });
});
