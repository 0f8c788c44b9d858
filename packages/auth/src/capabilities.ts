/**
 * Role capability definitions
 *
 * Capabilities follow the pattern {resource}:{action}. Routes declare the
 * capability they need; roles are mapped to capabilities here and nowhere else.
 */

export const ROLES = ['user', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export const CAPABILITIES = [
  'profile:read',
  'profile:write',
  'wallet:read',
  'wallet:fund',
  'transfers:send',
  'transactions:read',
  'beneficiaries:manage',
  'notifications:manage',
  'admin:read',
  'admin:write',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

const USER_CAPABILITIES = [
  'profile:read',
  'profile:write',
  'wallet:read',
  'wallet:fund',
  'transfers:send',
  'transactions:read',
  'beneficiaries:manage',
  'notifications:manage',
] as const satisfies readonly Capability[];

export const ROLE_CAPABILITIES = {
  user: USER_CAPABILITIES,
  admin: [...USER_CAPABILITIES, 'admin:read', 'admin:write'],
} as const satisfies Record<Role, readonly Capability[]>;

export function capabilitiesForRole(role: Role): readonly Capability[] {
  return ROLE_CAPABILITIES[role];
}
