import { UserRole } from '../enums/auth.enum';
import { AuthorizationError } from '../errors/domain-errors';

export const ROLE_ORDER: readonly UserRole[] = [
  UserRole.GUEST,
  UserRole.MEMBER,
  UserRole.STAFF,
  UserRole.MANAGER,
  UserRole.ADMIN,
];

/** The resolved caller every core operation receives. */
export interface Actor {
  userId: string;
  role: UserRole;
}

export function isUserRole(value: unknown): value is UserRole {
  return ROLE_ORDER.some((role) => role === value);
}

export function atLeast(role: UserRole, required: UserRole): boolean {
  return ROLE_ORDER.indexOf(role) >= ROLE_ORDER.indexOf(required);
}

export function assertRole(actor: Actor, required: UserRole, action?: string): void {
  if (!atLeast(actor.role, required)) {
    throw new AuthorizationError(
      `${action ? `${action} requires` : 'Requires'} role ${required} or above (caller is ${actor.role})`,
      'INSUFFICIENT_PERMISSIONS',
      { required_role: required },
    );
  }
}

export function assertOwner(actor: Actor, ownerId: string, action: string): void {
  if (actor.userId !== ownerId) {
    throw new AuthorizationError(`Only the owner may ${action}`, 'NOT_OWNER');
  }
}
