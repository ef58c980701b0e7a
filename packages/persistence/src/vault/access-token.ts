/**
 * Access token record held by the vault
 */

/**
 * The four fields persisted together; there is no partial record.
 */
export interface AccessTokenRecord {
  access_token: string;
  /** Absolute expiry as an integer epoch value */
  expires_at: number;
  refresh_token: string;
  user_id: string;
}

export type AccessTokenField = keyof AccessTokenRecord;

/**
 * Fixed storage keys within a vault namespace, in write order
 */
export const ACCESS_TOKEN_FIELDS: readonly AccessTokenField[] = [
  'access_token',
  'expires_at',
  'refresh_token',
  'user_id',
];

/**
 * Whether the record's expiry lies at or before `now` (same epoch unit as expires_at)
 */
export function isAccessTokenExpired(record: AccessTokenRecord, now: number): boolean {
  return record.expires_at <= now;
}

export function accessTokenRecordEquals(a: AccessTokenRecord, b: AccessTokenRecord): boolean {
  return ACCESS_TOKEN_FIELDS.every((field) => a[field] === b[field]);
}

/**
 * Text form of each field as it is handed to the cipher
 */
export function serializeAccessTokenFields(record: AccessTokenRecord): Record<AccessTokenField, string> {
  return {
    access_token: record.access_token,
    expires_at: String(record.expires_at),
    refresh_token: record.refresh_token,
    user_id: record.user_id,
  };
}
