/**
 * @ticketdesk/teams
 *
 * Team data access and the team membership service.
 */

export { default as TeamModel } from './models/team';
export { TeamMembershipService } from './services/teamMembershipService';
