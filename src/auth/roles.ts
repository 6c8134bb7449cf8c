/** Access level resolved from a bearer credential. */
export type Role = 'read-only' | 'read-write';

export const ROLE_SCOPES: Readonly<Record<Role, readonly string[]>> = {
  'read-only': ['read'],
  'read-write': ['read', 'write'],
};

export function isRole(value: unknown): value is Role {
  return value === 'read-only' || value === 'read-write';
}

export function canWrite(role: Role | undefined): role is 'read-write' {
  return role === 'read-write';
}
