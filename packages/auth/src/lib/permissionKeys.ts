import type { PermissionKey } from '@deskflow/types';

export const PERMISSION_KEYS: readonly PermissionKey[] = ['ro', 'move_into', 'create', 'note', 'owner', 'priority', 'rw'];

const KNOWN_KEYS: ReadonlySet<string> = new Set(PERMISSION_KEYS);

function isPermissionKey(value: string): value is PermissionKey {
  return KNOWN_KEYS.has(value);
}

/**
 * The only place a stored permission string becomes a PermissionKey. Unknown keys yield null.
 */
export function parsePermissionKey(raw: string | null | undefined): PermissionKey | null {
  if (raw == null) return null;
  const normalized = raw.trim().toLowerCase();
  return isPermissionKey(normalized) ? normalized : null;
}

/**
 * Keys that satisfy a required capability: the capability itself, or `rw`.
 */
export function grantingKeys(capability: PermissionKey): PermissionKey[] {
  return capability === 'rw' ? ['rw'] : [capability, 'rw'];
}

const UNKNOWN_PERMISSION_RANK = 4;

/**
 * Lower is stronger. Used to pick a default queue when several grants apply.
 */
export function rankQueuePermission(raw: string | null | undefined): number {
  switch (parsePermissionKey(raw)) {
    case 'rw':
      return 0;
    case 'create':
    case 'move_into':
      return 1;
    case 'note':
    case 'owner':
    case 'priority':
      return 2;
    case 'ro':
      return 3;
    default:
      return UNKNOWN_PERMISSION_RANK;
  }
}
