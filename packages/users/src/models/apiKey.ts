import type { DbBoolean, DbTimestamp, KnexOrTrx } from '@ticketdesk/database';
import { insertReturningId, nowIso, toBoolean, toIsoString, toNullableIsoString } from '@ticketdesk/database';
import type { IApiKey } from '@ticketdesk/types';

interface ApiKeyRecord {
  id: number;
  user_id: number;
  key_hash: string;
  description: string | null;
  active: DbBoolean;
  created_at: DbTimestamp;
  last_used_at: DbTimestamp | null;
}

function toApiKey(record: ApiKeyRecord): IApiKey {
  return {
    id: record.id,
    user_id: record.user_id,
    key_hash: record.key_hash,
    description: record.description,
    active: toBoolean(record.active),
    created_at: toIsoString(record.created_at),
    last_used_at: toNullableIsoString(record.last_used_at),
  };
}

const ApiKeyModel = {
  create: async (
    knexOrTrx: KnexOrTrx,
    userId: number,
    keyHash: string,
    description: string | null = null
  ): Promise<number> => {
    return insertReturningId(knexOrTrx, 'api_keys', {
      user_id: userId,
      key_hash: keyHash,
      description,
      active: true,
      created_at: nowIso(),
    });
  },

  findActiveByHash: async (knexOrTrx: KnexOrTrx, keyHash: string): Promise<IApiKey | null> => {
    const record = await knexOrTrx<ApiKeyRecord>('api_keys')
      .where({ key_hash: keyHash, active: true })
      .first();
    return record ? toApiKey(record) : null;
  },

  touch: async (knexOrTrx: KnexOrTrx, apiKeyId: number): Promise<void> => {
    await knexOrTrx<ApiKeyRecord>('api_keys')
      .where({ id: apiKeyId })
      .update({ last_used_at: nowIso() });
  },

  deactivate: async (knexOrTrx: KnexOrTrx, apiKeyId: number): Promise<number> => {
    return knexOrTrx<ApiKeyRecord>('api_keys')
      .where({ id: apiKeyId, active: true })
      .update({ active: false });
  },
};

export default ApiKeyModel;
