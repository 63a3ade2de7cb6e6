import { canModifyTeam, roleAtLeast, type TeamRole } from './enums';
import type { MembershipPatch, TeamMembership } from './types';

type MembershipState = Pick<TeamMembership, 'joinedAt' | 'deletedAt'>;

export type MembershipStatus = 'pending' | 'active' | 'deleted';

export function isPending(m: MembershipState): boolean {
  return m.joinedAt === null && m.deletedAt === null;
}

export function isActiveMembership(m: MembershipState): boolean {
  return m.joinedAt !== null && m.deletedAt === null;
}

export function membershipStatus(m: MembershipState): MembershipStatus {
  if (isPending(m)) return 'pending';
  if (isActiveMembership(m)) return 'active';
  return 'deleted';
}

/** Joins a pending membership; anything else is left as it is. */
export function acceptInvitation(m: MembershipState, now: Date): MembershipPatch | null {
  return isPending(m) ? { joinedAt: now } : null;
}

export function deactivateMembership(now: Date): MembershipPatch {
  return { deletedAt: now };
}

export function reactivateMembership(): MembershipPatch {
  return { deletedAt: null };
}

export function hasPermission(m: Pick<TeamMembership, 'role' | 'joinedAt' | 'deletedAt'>, required: TeamRole): boolean {
  return isActiveMembership(m) && roleAtLeast(m.role, required);
}

export function canManageTeam(m: Pick<TeamMembership, 'role' | 'joinedAt' | 'deletedAt'>): boolean {
  return isActiveMembership(m) && canModifyTeam(m.role);
}

// Helpers over a team's full membership list.

export function activeMembers(memberships: TeamMembership[]): TeamMembership[] {
  return memberships.filter(isActiveMembership);
}

export function owners(memberships: TeamMembership[]): TeamMembership[] {
  return activeMembers(memberships).filter((m) => m.role === 'owner');
}

export function admins(memberships: TeamMembership[]): TeamMembership[] {
  return activeMembers(memberships).filter((m) => canModifyTeam(m.role));
}

export function memberCount(memberships: TeamMembership[]): number {
  return activeMembers(memberships).length;
}

export function hasMember(memberships: TeamMembership[], userId: string): boolean {
  return activeMembers(memberships).some((m) => m.userId === userId);
}

export function memberRole(memberships: TeamMembership[], userId: string): TeamRole | null {
  return activeMembers(memberships).find((m) => m.userId === userId)?.role ?? null;
}

export function canUserModify(memberships: TeamMembership[], userId: string): boolean {
  const role = memberRole(memberships, userId);
  return role !== null && canModifyTeam(role);
}
