/**
 * Example: A per-entity permission store with named flags.
 *
 * Usage:
 *   npx tsx examples/user-permissions.ts
 */
import { PermissionStore } from '../src/index.js';

enum UserPermission {
  READ = 1,
  WRITE = 2,
  PUBLISH = 7,
}

class UserPermissions extends PermissionStore {
  canPublish(): boolean {
    return this.hasAllPermissions(
      UserPermission.WRITE,
      UserPermission.PUBLISH
    );
  }
}

function main() {
  const permissions = new UserPermissions(10).setPermissions([
    UserPermission.READ,
    UserPermission.WRITE,
    UserPermission.PUBLISH,
  ]);
  console.log('Can publish:', permissions.canPublish()); // true

  permissions.unsetPermission(UserPermission.WRITE);
  console.log('Can publish:', permissions.canPublish()); // false

  // Persisting is up to the caller, e.g. as Gibbon positions
  const stored = permissions.toGibbon().getPositionsArray();
  console.log('Stored positions:', stored); // [2, 8]

  const restored = new UserPermissions(10).restore(permissions.bitMask);
  console.log('Restored mask:', restored.bitMask); // 130n
}

main();
