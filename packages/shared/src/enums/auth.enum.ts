/**
 * Declared lowest to highest. Comparison goes through `atLeast`, never
 * through the string values.
 */
export enum UserRole {
  GUEST = 'guest',
  MEMBER = 'member',
  STAFF = 'staff',
  MANAGER = 'manager',
  ADMIN = 'admin',
}
