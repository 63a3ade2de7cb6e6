import { ForbiddenError, NotFoundError } from '../errors';
import type { TeamRole } from '../models/enums';
import { hasPermission, isActiveMembership } from '../models/team';
import type { Team, TeamMembership } from '../models/types';
import type { TeamRepository } from '../repositories/types';

export interface TeamAccessGrant {
  team: Team;
  membership: TeamMembership;
}

/**
 * Resolves a user's standing in a team. Outsiders get the caller's 404 so a
 * team's existence is not revealed; members below `required` get a 403.
 */
export class TeamAccess {
  constructor(private readonly teams: TeamRepository) {}

  async require(
    teamId: string,
    userId: string,
    required: TeamRole,
    notFoundMessage = 'Team not found'
  ): Promise<TeamAccessGrant> {
    const team = await this.teams.findById(teamId);
    if (!team) throw new NotFoundError(notFoundMessage);

    const membership = await this.teams.findMembership(teamId, userId);
    if (!membership || !isActiveMembership(membership)) {
      throw new NotFoundError(notFoundMessage);
    }
    if (!hasPermission(membership, required)) {
      throw new ForbiddenError(`This action requires the ${required} role or higher`);
    }
    return { team, membership };
  }

  async isActiveMember(teamId: string, userId: string): Promise<boolean> {
    const membership = await this.teams.findMembership(teamId, userId);
    return membership !== null && isActiveMembership(membership);
  }
}
