/**
 * Schema-agnostic field lookup by conventional column aliases.
 */

import { cellToText, getCell } from '../ingestion/record-store.js';
import type { Row } from '../types/records.js';

export interface FieldAliases {
  readonly device: readonly string[];
  readonly account: readonly string[];
  readonly eventId: readonly string[];
}

export const DEFAULT_FIELD_ALIASES: FieldAliases = Object.freeze({
  device: Object.freeze([
    'device', 'computer', 'hostname', 'host_name', 'system', 'machine_name', 'computer_name',
  ]),
  account: Object.freeze([
    'account', 'user', 'username', 'user_name', 'account_name',
    'subject_user_name', 'target_user_name', 'logon_account',
  ]),
  eventId: Object.freeze(['event_id', 'eventid', 'event id', 'id', 'eventid_value']),
});

/**
 * Return the first alias present on the row with a non-empty value,
 * as text. Null when none of the aliases carry a value.
 */
export function lookupFirst(row: Row, aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    const text = cellToText(getCell(row, alias));
    if (text !== null && text.trim() !== '') return text;
  }
  return null;
}

export interface RowFields {
  deviceName: string | null;
  account: string | null;
  eventId: string | null;
}

export function extractRowFields(row: Row, aliases: FieldAliases = DEFAULT_FIELD_ALIASES): RowFields {
  return {
    deviceName: lookupFirst(row, aliases.device),
    account: lookupFirst(row, aliases.account),
    eventId: lookupFirst(row, aliases.eventId),
  };
}
