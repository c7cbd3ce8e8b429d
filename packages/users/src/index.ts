/**
 * @ticketdesk/users
 *
 * User and API key data access.
 */

export { default as UserModel, toUser, toUserBrief, toUserAvailability } from './models/user';
export type { UserRecord } from './models/user';
export { default as ApiKeyModel } from './models/apiKey';
export { generateApiKey, hashApiKey, issueApiKey, authenticateApiKey, revokeApiKey } from './lib/apiKeys';
