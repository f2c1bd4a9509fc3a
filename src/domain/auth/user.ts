/**
 * User domain types as seen by the rest of the application.
 * Nothing here is persisted locally; the identity provider owns the account.
 */
export const USER_ROLES = ['patient', 'doctor'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const USER_STATUSES = [
  'UNCONFIRMED',
  'CONFIRMED',
  'ARCHIVED',
  'COMPROMISED',
  'UNKNOWN',
  'RESET_REQUIRED',
  'FORCE_CHANGE_PASSWORD',
  'EXTERNAL_PROVIDER',
] as const;

export type UserStatus = (typeof USER_STATUSES)[number];

export interface UserAttribute {
  readonly name: string;
  readonly value: string;
}

export interface UserRecord {
  readonly username: string;
  readonly attributes: readonly UserAttribute[];
  readonly createdAt: string;
  readonly lastModifiedAt: string;
  readonly status: UserStatus;
  readonly enabled: boolean;
}

/** Attributes that never leave the service: the national id (CPF). */
export const PRIVATE_USER_ATTRIBUTES: readonly string[] = ['custom:cpf'];

export function withoutPrivateAttributes(record: UserRecord): UserRecord {
  return {
    ...record,
    attributes: record.attributes.filter(
      (attribute) => !PRIVATE_USER_ATTRIBUTES.includes(attribute.name)
    ),
  };
}
