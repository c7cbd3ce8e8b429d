import type { DbTimestamp, KnexOrTrx } from '@ticketdesk/database';
import { toIsoString } from '@ticketdesk/database';
import type { ITeam, ITeamForUser, ITeamMembership, IUserBrief, TeamRole } from '@ticketdesk/types';

interface TeamRecord {
  id: number;
  name: string;
  created_at: DbTimestamp;
}

interface UserTeamRecord {
  id: number;
  user_id: number;
  team_id: number;
  role: TeamRole;
  joined_at: DbTimestamp;
}

interface TeamForUserRow {
  id: number;
  name: string;
  role: TeamRole;
  joined_at: DbTimestamp;
}

function toMembership(record: Pick<UserTeamRecord, 'user_id' | 'team_id' | 'role' | 'joined_at'>): ITeamMembership {
  return {
    user_id: record.user_id,
    team_id: record.team_id,
    role: record.role,
    joined_at: toIsoString(record.joined_at),
  };
}

const TeamModel = {
  get: async (knexOrTrx: KnexOrTrx, teamId: number): Promise<ITeam | null> => {
    const record = await knexOrTrx<TeamRecord>('teams')
      .where({ id: teamId })
      .first();
    return record
      ? { id: record.id, name: record.name, created_at: toIsoString(record.created_at) }
      : null;
  },

  getMembership: async (knexOrTrx: KnexOrTrx, teamId: number, userId: number): Promise<ITeamMembership | null> => {
    const record = await knexOrTrx<UserTeamRecord>('user_teams')
      .where({ team_id: teamId, user_id: userId })
      .first();
    return record ? toMembership(record) : null;
  },

  /**
   * The team the user joined first; ties on join time go to the lowest team id.
   */
  getFirstTeamIdForUser: async (knexOrTrx: KnexOrTrx, userId: number): Promise<number | null> => {
    const record = await knexOrTrx<UserTeamRecord>('user_teams')
      .where({ user_id: userId })
      .orderBy([
        { column: 'joined_at', order: 'asc' },
        { column: 'team_id', order: 'asc' },
      ])
      .first();
    return record ? record.team_id : null;
  },

  listForUser: async (knexOrTrx: KnexOrTrx, userId: number): Promise<ITeamForUser[]> => {
    const rows = await knexOrTrx('teams')
      .join('user_teams', 'user_teams.team_id', 'teams.id')
      .where('user_teams.user_id', userId)
      .orderBy('teams.id', 'asc')
      .select<TeamForUserRow[]>('teams.id', 'teams.name', 'user_teams.role', 'user_teams.joined_at');

    return rows.map((row): ITeamForUser => ({
      id: row.id,
      name: row.name,
      role: row.role,
      joined_at: toIsoString(row.joined_at),
    }));
  },

  listMemberBriefs: async (knexOrTrx: KnexOrTrx, teamId: number): Promise<IUserBrief[]> => {
    return knexOrTrx('users')
      .join('user_teams', 'user_teams.user_id', 'users.id')
      .where('user_teams.team_id', teamId)
      .orderBy('users.id', 'asc')
      .select<IUserBrief[]>('users.id', 'users.name');
  },

  listAvailableMemberBriefs: async (knexOrTrx: KnexOrTrx, teamId: number, role: TeamRole): Promise<IUserBrief[]> => {
    return knexOrTrx('users')
      .join('user_teams', 'user_teams.user_id', 'users.id')
      .where('user_teams.team_id', teamId)
      .andWhere('user_teams.role', role)
      .andWhere('users.is_available', true)
      .orderBy('users.id', 'asc')
      .select<IUserBrief[]>('users.id', 'users.name');
  },

  addMember: async (
    knexOrTrx: KnexOrTrx,
    teamId: number,
    userId: number,
    role: TeamRole,
    joinedAt: string
  ): Promise<void> => {
    await knexOrTrx<UserTeamRecord>('user_teams').insert({
      team_id: teamId,
      user_id: userId,
      role,
      joined_at: joinedAt,
    });
  },

  removeMember: async (knexOrTrx: KnexOrTrx, teamId: number, userId: number): Promise<number> => {
    return knexOrTrx<UserTeamRecord>('user_teams')
      .where({ team_id: teamId, user_id: userId })
      .del();
  },
};

export default TeamModel;
