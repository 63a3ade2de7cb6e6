import { beforeEach, describe, it, expect } from 'vitest';
import { addMember, createTeam, createTestContext, createUser, type TestContext } from '../../__tests__/support/context';
import type { Team, User } from '../../models/types';

describe('TeamService', () => {
  let ctx: TestContext;
  let owner: User;

  beforeEach(async () => {
    ctx = createTestContext();
    owner = await createUser(ctx, 'Owner');
  });

  describe('teams', () => {
    it('creates a team with its creator as active owner', async () => {
      const team = await ctx.services.teams.createTeam(owner, {
        name: 'Platform Team',
        allowPublicSignup: false,
        defaultTaskPriority: 'high'
      });

      expect(team.slug).toBe('platform-team');
      expect(team.role).toBe('owner');
      expect(team.memberCount).toBe(1);
      const membership = await ctx.repos.teams.findMembership(team.id, owner.id);
      expect(membership).toMatchObject({ role: 'owner', joinedAt: ctx.clock.now(), deletedAt: null });
    });

    it('refuses a taken slug', async () => {
      await ctx.services.teams.createTeam(owner, { name: 'Core', allowPublicSignup: false, defaultTaskPriority: 'medium' });
      await expect(
        ctx.services.teams.createTeam(owner, { name: 'Other', slug: 'core', allowPublicSignup: false, defaultTaskPriority: 'medium' })
      ).rejects.toMatchObject({ status: 409, message: 'Team slug already taken' });
    });

    it('refuses a name with nothing to slug', async () => {
      await expect(
        ctx.services.teams.createTeam(owner, { name: '???', allowPublicSignup: false, defaultTaskPriority: 'medium' })
      ).rejects.toMatchObject({ status: 400 });
    });

    it('lists only teams with an active membership', async () => {
      const mine = await createTeam(ctx, owner, 'Alpha');
      const stranger = await createUser(ctx, 'Stranger');
      await createTeam(ctx, stranger, 'Beta');

      const teams = await ctx.services.teams.listTeams(owner);
      expect(teams.map((t) => t.id)).toEqual([mine.id]);
      expect(teams[0]).toMatchObject({ role: 'owner', memberCount: 1 });
    });

    it('hides teams from non-members behind a 404', async () => {
      const team = await createTeam(ctx, owner);
      const outsider = await createUser(ctx, 'Outsider');
      await expect(ctx.services.teams.getTeam(outsider, team.id)).rejects.toMatchObject({
        status: 404,
        message: 'Team not found'
      });
    });

    it('needs admin to update and owner to delete', async () => {
      const team = await createTeam(ctx, owner);
      const member = await createUser(ctx, 'Member');
      const admin = await createUser(ctx, 'Admin');
      await addMember(ctx, team, owner, member, 'member');
      await addMember(ctx, team, owner, admin, 'admin');

      await expect(ctx.services.teams.updateTeam(member, team.id, { name: 'Renamed' })).rejects.toMatchObject({
        status: 403,
        message: 'This action requires the admin role or higher'
      });
      const updated = await ctx.services.teams.updateTeam(admin, team.id, { name: 'Renamed' });
      expect(updated.name).toBe('Renamed');
      expect(updated.memberCount).toBe(3);

      await expect(ctx.services.teams.deleteTeam(admin, team.id)).rejects.toMatchObject({ status: 403 });
      await ctx.services.teams.deleteTeam(owner, team.id);
      await expect(ctx.services.teams.getTeam(owner, team.id)).rejects.toMatchObject({ status: 404 });
    });

    it('checks a new slug for uniqueness', async () => {
      const team = await createTeam(ctx, owner, 'First');
      await createTeam(ctx, owner, 'Second');
      await expect(ctx.services.teams.updateTeam(owner, team.id, { slug: 'second' })).rejects.toMatchObject({
        status: 409
      });
    });
  });

  describe('invitations', () => {
    let team: Team;
    let invitee: User;

    beforeEach(async () => {
      team = await createTeam(ctx, owner);
      invitee = await createUser(ctx, 'Invitee');
    });

    it('invites by email as a pending membership', async () => {
      const membership = await ctx.services.teams.inviteMember(owner, team.id, { email: invitee.email, role: 'member' });
      expect(membership).toMatchObject({ userId: invitee.id, role: 'member', joinedAt: null, invitedById: owner.id });

      const members = await ctx.services.teams.listMembers(owner, team.id);
      expect(members.map((m) => m.userId)).toEqual([owner.id]);
      const withPending = await ctx.services.teams.listMembers(owner, team.id, true);
      expect(withPending.map((m) => [m.userId, m.status])).toEqual([
        [owner.id, 'active'],
        [invitee.id, 'pending']
      ]);
      expect(withPending[1].user).toEqual({
        id: invitee.id,
        email: invitee.email,
        firstName: 'Invitee',
        lastName: 'User'
      });
    });

    it('refuses duplicate invitations and unknown users', async () => {
      await ctx.services.teams.inviteMember(owner, team.id, { userId: invitee.id, role: 'member' });
      await expect(
        ctx.services.teams.inviteMember(owner, team.id, { userId: invitee.id, role: 'viewer' })
      ).rejects.toMatchObject({ status: 409, message: 'User is already a member of this team' });
      await expect(
        ctx.services.teams.inviteMember(owner, team.id, { email: 'ghost@example.com', role: 'member' })
      ).rejects.toMatchObject({ status: 404, message: 'User not found' });
    });

    it('does not let an admin grant owner', async () => {
      const admin = await createUser(ctx, 'Admin');
      await addMember(ctx, team, owner, admin, 'admin');
      await expect(
        ctx.services.teams.inviteMember(admin, team.id, { userId: invitee.id, role: 'owner' })
      ).rejects.toMatchObject({ status: 403, message: 'Cannot grant a role higher than your own' });
    });

    it('accepts, lists and declines invitations', async () => {
      await ctx.services.teams.inviteMember(owner, team.id, { userId: invitee.id, role: 'viewer' });
      const invitations = await ctx.services.teams.listInvitations(invitee);
      expect(invitations.map((i) => i.team.id)).toEqual([team.id]);

      const joined = await ctx.services.teams.acceptInvitation(invitee, team.id);
      expect(joined.joinedAt).toEqual(ctx.clock.now());
      expect(await ctx.services.teams.listInvitations(invitee)).toEqual([]);
      await expect(ctx.services.teams.acceptInvitation(invitee, team.id)).rejects.toMatchObject({
        status: 404,
        message: 'No pending invitation for this team'
      });
    });

    it('declining removes the invitation and a later invite revives it', async () => {
      await ctx.services.teams.inviteMember(owner, team.id, { userId: invitee.id, role: 'member' });
      await ctx.services.teams.declineInvitation(invitee, team.id);
      expect(await ctx.services.teams.listInvitations(invitee)).toEqual([]);

      const again = await ctx.services.teams.inviteMember(owner, team.id, { userId: invitee.id, role: 'admin' });
      expect(again).toMatchObject({ role: 'admin', joinedAt: null, deletedAt: null });
      expect(ctx.repos.teams.memberships.size).toBe(2);
    });
  });

  describe('roles and removal', () => {
    let team: Team;
    let admin: User;
    let member: User;

    beforeEach(async () => {
      team = await createTeam(ctx, owner);
      admin = await createUser(ctx, 'Admin');
      member = await createUser(ctx, 'Member');
      await addMember(ctx, team, owner, admin, 'admin');
      await addMember(ctx, team, owner, member, 'member');
    });

    it('lets an admin change lower-ranked members only', async () => {
      const changed = await ctx.services.teams.changeMemberRole(admin, team.id, member.id, 'viewer');
      expect(changed.role).toBe('viewer');

      await expect(ctx.services.teams.changeMemberRole(admin, team.id, owner.id, 'member')).rejects.toMatchObject({
        status: 403,
        message: 'Cannot modify a member with an equal or higher role'
      });
    });

    it('keeps at least one owner', async () => {
      await expect(ctx.services.teams.changeMemberRole(owner, team.id, owner.id, 'admin')).rejects.toMatchObject({
        status: 409,
        message: 'Team must keep at least one owner'
      });
      await expect(ctx.services.teams.removeMember(owner, team.id, owner.id)).rejects.toMatchObject({ status: 409 });

      await ctx.services.teams.changeMemberRole(owner, team.id, admin.id, 'owner');
      await ctx.services.teams.removeMember(owner, team.id, owner.id);
      await expect(ctx.services.teams.getTeam(owner, team.id)).rejects.toMatchObject({ status: 404 });
    });

    it('lets members leave and admins remove lower ranks', async () => {
      await expect(ctx.services.teams.removeMember(member, team.id, admin.id)).rejects.toMatchObject({
        status: 403
      });
      await ctx.services.teams.removeMember(admin, team.id, member.id);
      expect((await ctx.services.teams.listMembers(owner, team.id)).map((m) => m.userId)).toEqual([
        owner.id,
        admin.id
      ]);

      await ctx.services.teams.removeMember(admin, team.id, admin.id);
      expect((await ctx.services.teams.getTeam(owner, team.id)).memberCount).toBe(1);
    });
  });

  describe('public teams', () => {
    it('joins only teams that allow public signup', async () => {
      const closed = await createTeam(ctx, owner, 'Closed');
      const open = await ctx.services.teams.createTeam(owner, {
        name: 'Open',
        allowPublicSignup: true,
        defaultTaskPriority: 'medium'
      });
      const joiner = await createUser(ctx, 'Joiner');

      await expect(ctx.services.teams.joinTeam(joiner, closed.id)).rejects.toMatchObject({ status: 403 });

      const membership = await ctx.services.teams.joinTeam(joiner, open.id);
      expect(membership).toMatchObject({ role: 'member', joinedAt: ctx.clock.now() });
      await expect(ctx.services.teams.joinTeam(joiner, open.id)).rejects.toMatchObject({ status: 409 });
    });
  });
});
