/**
 * @ticketdesk/projects
 *
 * Project data access: project lookup and membership queries.
 */

export { default as ProjectModel, toContainsPattern } from './models/project';
