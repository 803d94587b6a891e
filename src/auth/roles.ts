import type { Role } from '../types/records.js';

export const ROLES: readonly Role[] = ['Administrator', 'Manager', 'Engineer', 'Viewer'];

export function isValidRole(value: string): value is Role {
  return ROLES.some(role => role === value);
}

/**
 * Parses a comma separated role list such as "Administrator,Manager".
 * Unknown names are rejected.
 */
export function parseRoleList(value: string): Role[] {
  const roles: Role[] = [];
  for (const part of value.split(',')) {
    const name = part.trim();
    if (!name) continue;
    if (!isValidRole(name)) throw new Error(`Unknown role "${name}"`);
    if (!roles.includes(name)) roles.push(name);
  }
  return roles;
}

export function hasRole(role: Role, allowed: readonly Role[]): boolean {
  return allowed.includes(role);
}

export const isAdministrator = (role: Role) => role === 'Administrator';
