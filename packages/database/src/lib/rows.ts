import type { KnexOrTrx, DbBoolean, DbTimestamp } from '../types';

export function nowIso(): string {
  return new Date().toISOString();
}

export function toIsoString(value: DbTimestamp): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  // SQLite CURRENT_TIMESTAMP defaults come back as "YYYY-MM-DD HH:MM:SS" in UTC
  const parsed = new Date(value.includes('T') ? value : `${value.replace(' ', 'T')}Z`);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

export function toNullableIsoString(value: DbTimestamp | null | undefined): string | null {
  return value === null || value === undefined ? null : toIsoString(value);
}

export function toBoolean(value: DbBoolean): boolean {
  return typeof value === 'boolean' ? value : value !== 0;
}

/**
 * Inserts a row and returns its generated integer id.
 */
export async function insertReturningId(
  knexOrTrx: KnexOrTrx,
  table: string,
  row: Record<string, unknown>
): Promise<number> {
  const inserted: unknown[] = await knexOrTrx(table).insert(row).returning('id');
  const first = inserted[0];
  const id = typeof first === 'object' && first !== null && 'id' in first
    ? Number(first.id)
    : Number(first);

  if (!Number.isInteger(id)) {
    throw new Error(`Failed to read generated id for ${table}`);
  }
  return id;
}
