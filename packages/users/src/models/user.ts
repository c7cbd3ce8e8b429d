import type { DbBoolean, DbTimestamp, KnexOrTrx } from '@ticketdesk/database';
import { toBoolean, toIsoString } from '@ticketdesk/database';
import type { IUser, IUserAvailability, IUserBrief } from '@ticketdesk/types';

export interface UserRecord {
  id: number;
  name: string;
  email: string;
  is_available: DbBoolean;
  created_at: DbTimestamp;
}

export function toUser(record: UserRecord): IUser {
  return {
    id: record.id,
    name: record.name,
    email: record.email,
    is_available: toBoolean(record.is_available),
    created_at: toIsoString(record.created_at),
  };
}

export function toUserBrief(user: Pick<IUser, 'id' | 'name'>): IUserBrief {
  return { id: user.id, name: user.name };
}

export function toUserAvailability(user: IUser): IUserAvailability {
  return { id: user.id, name: user.name, is_available: user.is_available };
}

const UserModel = {
  get: async (knexOrTrx: KnexOrTrx, userId: number): Promise<IUser | null> => {
    const record = await knexOrTrx<UserRecord>('users')
      .where({ id: userId })
      .first();
    return record ? toUser(record) : null;
  },

  setAvailability: async (knexOrTrx: KnexOrTrx, userId: number, isAvailable: boolean): Promise<boolean> => {
    const updated = await knexOrTrx<UserRecord>('users')
      .where({ id: userId })
      .update({ is_available: isAvailable });
    return updated > 0;
  },
};

export default UserModel;
