import { randomUUID } from 'crypto';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  isDuplicateEntryError
} from '../errors';
import type { Logger } from '../logger';
import { roleAtLeast, roleLevel, type TeamRole } from '../models/enums';
import {
  acceptInvitation,
  activeMembers,
  deactivateMembership,
  isActiveMembership,
  isPending,
  memberCount,
  membershipStatus,
  owners,
  reactivateMembership,
  type MembershipStatus
} from '../models/team';
import type { Team, TeamMembership, User } from '../models/types';
import type { TeamRepository, UserRepository } from '../repositories/types';
import type { InviteInput, TeamCreateInput, TeamUpdateInput } from '../schemas/team';
import { utcNow } from '../utils/dates';
import { slugify } from '../utils/slug';
import { TeamAccess } from './access';

export interface TeamView extends Team {
  role: TeamRole;
  memberCount: number;
}

export interface MemberUser {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
}

export interface MemberView extends TeamMembership {
  status: MembershipStatus;
  user: MemberUser | null;
}

export interface InvitationView {
  membership: TeamMembership;
  team: Team;
}

const ALREADY_MEMBER = 'User is already a member of this team';
const NO_INVITATION = 'No pending invitation for this team';

export class TeamService {
  private readonly access: TeamAccess;

  constructor(
    private readonly teams: TeamRepository,
    private readonly users: UserRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = utcNow
  ) {
    this.access = new TeamAccess(teams);
  }

  async createTeam(actor: User, data: TeamCreateInput): Promise<TeamView> {
    const slug = data.slug ?? slugify(data.name);
    if (!slug) throw new BadRequestError('Team name must contain letters or digits');
    if (await this.teams.findBySlug(slug)) throw new ConflictError('Team slug already taken');

    const now = this.now();
    const teamId = randomUUID();
    try {
      const { team, membership } = await this.teams.createWithOwner(
        {
          id: teamId,
          name: data.name,
          slug,
          description: data.description ?? null,
          isActive: true,
          allowPublicSignup: data.allowPublicSignup,
          defaultTaskPriority: data.defaultTaskPriority,
          deletedAt: null
        },
        {
          id: randomUUID(),
          userId: actor.id,
          teamId,
          role: 'owner',
          invitedAt: now,
          joinedAt: now,
          invitedById: null,
          deletedAt: null
        }
      );
      this.logger.info(`User ${actor.id} created team ${team.id} (${team.slug})`);
      return { ...team, role: membership.role, memberCount: 1 };
    } catch (err) {
      if (isDuplicateEntryError(err)) throw new ConflictError('Team slug already taken');
      throw err;
    }
  }

  async listTeams(actor: User): Promise<TeamView[]> {
    const memberships = activeMembers(await this.teams.listMembershipsForUser(actor.id));
    const roles = new Map(memberships.map((m) => [m.teamId, m.role]));
    const teams = await this.teams.findByIds([...roles.keys()]);

    return Promise.all(
      teams.map(async (team) => ({
        ...team,
        role: roles.get(team.id) ?? 'viewer',
        memberCount: memberCount(await this.teams.listMemberships(team.id))
      }))
    );
  }

  async getTeam(actor: User, teamId: string): Promise<TeamView> {
    const { team, membership } = await this.access.require(teamId, actor.id, 'viewer');
    const memberships = await this.teams.listMemberships(team.id);
    return { ...team, role: membership.role, memberCount: memberCount(memberships) };
  }

  async updateTeam(actor: User, teamId: string, patch: TeamUpdateInput): Promise<TeamView> {
    const { team, membership } = await this.access.require(teamId, actor.id, 'admin');

    if (patch.slug !== undefined && patch.slug !== team.slug) {
      if (await this.teams.findBySlug(patch.slug)) throw new ConflictError('Team slug already taken');
    }

    const updated = await this.teams.update(team.id, {
      name: patch.name,
      slug: patch.slug,
      description: patch.description,
      isActive: patch.isActive,
      allowPublicSignup: patch.allowPublicSignup,
      defaultTaskPriority: patch.defaultTaskPriority
    });
    if (!updated) throw new NotFoundError('Team not found');
    const memberships = await this.teams.listMemberships(team.id);
    return { ...updated, role: membership.role, memberCount: memberCount(memberships) };
  }

  async deleteTeam(actor: User, teamId: string): Promise<void> {
    const { team } = await this.access.require(teamId, actor.id, 'owner');
    await this.teams.update(team.id, { isActive: false, deletedAt: this.now() });
    this.logger.info(`User ${actor.id} deleted team ${team.id}`);
  }

  async listMembers(actor: User, teamId: string, includePending = false): Promise<MemberView[]> {
    await this.access.require(teamId, actor.id, 'viewer');
    const memberships = (await this.teams.listMemberships(teamId)).filter(
      (m) => isActiveMembership(m) || (includePending && isPending(m))
    );
    const users = await this.users.findByIds(memberships.map((m) => m.userId));
    const byId = new Map(users.map((u) => [u.id, u]));

    return memberships.map((m) => {
      const user = byId.get(m.userId);
      return {
        ...m,
        status: membershipStatus(m),
        user: user
          ? { id: user.id, email: user.email, firstName: user.firstName, lastName: user.lastName }
          : null
      };
    });
  }

  async inviteMember(actor: User, teamId: string, input: InviteInput): Promise<TeamMembership> {
    const { membership: own } = await this.access.require(teamId, actor.id, 'admin');
    if (!roleAtLeast(own.role, input.role)) {
      throw new ForbiddenError('Cannot grant a role higher than your own');
    }

    const invitee = input.userId
      ? await this.users.findById(input.userId)
      : input.email
        ? await this.users.findByEmail(input.email)
        : null;
    if (!invitee || invitee.deletedAt) throw new NotFoundError('User not found');

    const now = this.now();
    const existing = await this.teams.findMembership(teamId, invitee.id);
    if (existing) {
      if (existing.deletedAt === null) throw new ConflictError(ALREADY_MEMBER);
      const renewed = await this.teams.updateMembership(existing.id, {
        ...reactivateMembership(),
        role: input.role,
        invitedAt: now,
        joinedAt: null,
        invitedById: actor.id
      });
      if (!renewed) throw new NotFoundError('Member not found');
      this.logger.info(`User ${actor.id} re-invited ${invitee.id} to team ${teamId}`);
      return renewed;
    }

    try {
      const created = await this.teams.createMembership({
        id: randomUUID(),
        userId: invitee.id,
        teamId,
        role: input.role,
        invitedAt: now,
        joinedAt: null,
        invitedById: actor.id,
        deletedAt: null
      });
      this.logger.info(`User ${actor.id} invited ${invitee.id} to team ${teamId} as ${input.role}`);
      return created;
    } catch (err) {
      if (isDuplicateEntryError(err)) throw new ConflictError(ALREADY_MEMBER);
      throw err;
    }
  }

  async acceptInvitation(actor: User, teamId: string): Promise<TeamMembership> {
    const invitation = await this.pendingInvitation(actor, teamId);
    const patch = acceptInvitation(invitation, this.now());
    if (!patch) throw new NotFoundError(NO_INVITATION);
    const joined = await this.teams.updateMembership(invitation.id, patch);
    if (!joined) throw new NotFoundError(NO_INVITATION);
    this.logger.info(`User ${actor.id} joined team ${teamId}`);
    return joined;
  }

  async declineInvitation(actor: User, teamId: string): Promise<void> {
    const invitation = await this.pendingInvitation(actor, teamId);
    await this.teams.updateMembership(invitation.id, deactivateMembership(this.now()));
  }

  async listInvitations(actor: User): Promise<InvitationView[]> {
    const pending = (await this.teams.listMembershipsForUser(actor.id)).filter(isPending);
    const teams = await this.teams.findByIds(pending.map((m) => m.teamId));
    const byId = new Map(teams.map((t) => [t.id, t]));

    const views: InvitationView[] = [];
    for (const membership of pending) {
      const team = byId.get(membership.teamId);
      if (team) views.push({ membership, team });
    }
    return views;
  }

  async changeMemberRole(actor: User, teamId: string, userId: string, role: TeamRole): Promise<TeamMembership> {
    const { membership: own } = await this.access.require(teamId, actor.id, 'admin');
    const target = await this.teams.findMembership(teamId, userId);
    if (!target || !isActiveMembership(target)) throw new NotFoundError('Member not found');

    if (own.role !== 'owner' && roleLevel(target.role) >= roleLevel(own.role)) {
      throw new ForbiddenError('Cannot modify a member with an equal or higher role');
    }
    if (!roleAtLeast(own.role, role)) {
      throw new ForbiddenError('Cannot grant a role higher than your own');
    }
    if (target.role === 'owner' && role !== 'owner') {
      await this.assertNotLastOwner(teamId);
    }

    const updated = await this.teams.updateMembership(target.id, { role });
    if (!updated) throw new NotFoundError('Member not found');
    this.logger.info(`User ${actor.id} changed role of ${userId} in team ${teamId} to ${role}`);
    return updated;
  }

  async removeMember(actor: User, teamId: string, userId: string): Promise<void> {
    const leaving = userId === actor.id;
    const { membership: own } = await this.access.require(teamId, actor.id, leaving ? 'viewer' : 'admin');

    const target = leaving ? own : await this.teams.findMembership(teamId, userId);
    if (!target || target.deletedAt) throw new NotFoundError('Member not found');

    if (!leaving && own.role !== 'owner' && roleLevel(target.role) >= roleLevel(own.role)) {
      throw new ForbiddenError('Cannot remove a member with an equal or higher role');
    }
    if (target.role === 'owner' && isActiveMembership(target)) {
      await this.assertNotLastOwner(teamId);
    }

    await this.teams.updateMembership(target.id, deactivateMembership(this.now()));
    this.logger.info(
      leaving ? `User ${actor.id} left team ${teamId}` : `User ${actor.id} removed ${userId} from team ${teamId}`
    );
  }

  async joinTeam(actor: User, teamId: string): Promise<TeamMembership> {
    const team = await this.teams.findById(teamId);
    if (!team) throw new NotFoundError('Team not found');

    const existing = await this.teams.findMembership(teamId, actor.id);
    if (existing && isActiveMembership(existing)) throw new ConflictError(ALREADY_MEMBER);
    if (!team.allowPublicSignup) throw new ForbiddenError('This team does not accept public signups');

    const now = this.now();
    let joined: TeamMembership | null;
    if (existing && isPending(existing)) {
      joined = await this.teams.updateMembership(existing.id, { joinedAt: now });
    } else if (existing) {
      joined = await this.teams.updateMembership(existing.id, {
        ...reactivateMembership(),
        role: 'member',
        invitedAt: now,
        joinedAt: now,
        invitedById: null
      });
    } else {
      joined = await this.teams.createMembership({
        id: randomUUID(),
        userId: actor.id,
        teamId,
        role: 'member',
        invitedAt: now,
        joinedAt: now,
        invitedById: null,
        deletedAt: null
      });
    }
    if (!joined) throw new NotFoundError('Team not found');
    this.logger.info(`User ${actor.id} joined public team ${teamId}`);
    return joined;
  }

  private async pendingInvitation(actor: User, teamId: string): Promise<TeamMembership> {
    const team = await this.teams.findById(teamId);
    const membership = team ? await this.teams.findMembership(teamId, actor.id) : null;
    if (!membership || !isPending(membership)) throw new NotFoundError(NO_INVITATION);
    return membership;
  }

  private async assertNotLastOwner(teamId: string): Promise<void> {
    if (owners(await this.teams.listMemberships(teamId)).length <= 1) {
      throw new ConflictError('Team must keep at least one owner');
    }
  }
}
