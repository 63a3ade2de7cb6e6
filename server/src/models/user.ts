import type { User, UserPatch } from './types';

type Named = Pick<User, 'firstName' | 'lastName' | 'email'>;

export function fullName(user: Named): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function displayName(user: Named): string {
  return fullName(user) || user.email;
}

export function initials(user: Named): string {
  if (user.firstName && user.lastName) {
    return `${user.firstName[0]}${user.lastName[0]}`.toUpperCase();
  }
  if (user.firstName) return user.firstName[0].toUpperCase();
  return user.email.charAt(0).toUpperCase();
}

export function isDeleted(user: Pick<User, 'deletedAt'>): boolean {
  return user.deletedAt !== null;
}

export function canLogin(user: Pick<User, 'isActive' | 'isVerified' | 'deletedAt'>): boolean {
  return user.isActive && user.isVerified && !isDeleted(user);
}

export function deactivate(now: Date): UserPatch {
  return { isActive: false, deletedAt: now };
}

export function activate(): UserPatch {
  return { isActive: true, deletedAt: null };
}
