export interface IUser {
  id: number;
  name: string;
  email: string;
  is_available: boolean;
  created_at: string;
}

/**
 * Minimal projection of a user, used in lists and nested in tickets.
 */
export interface IUserBrief {
  id: number;
  name: string;
}

export interface IUserAvailability {
  id: number;
  name: string;
  is_available: boolean;
}

export interface IApiKey {
  id: number;
  user_id: number;
  key_hash: string;
  description: string | null;
  active: boolean;
  created_at: string;
  last_used_at: string | null;
}
