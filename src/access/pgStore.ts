import type { QueryResult, QueryResultRow } from 'pg';

import { StoreUnavailableError } from '../errors.js';
import type {
  AccessDirection,
  AccessLogEntry,
  AccessLogRecord,
  AccessStore,
  CardRecord,
  ReaderType,
  UserRecord
} from '../types.js';

/** The slice of `pg.Pool` the store needs; a `PoolClient` works as well. */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

const USER_COLUMNS = `id, registration, name, active, valid_from AS "validFrom", valid_until AS "validUntil",
  allow_card AS "allowCard", allow_biometric AS "allowBiometric", allow_keypad AS "allowKeypad", code`;

const CARD_COLUMNS = `id, card_number AS "cardNumber", registration, user_id AS "userId", active,
  valid_from AS "validFrom", valid_until AS "validUntil"`;

const LOG_COLUMNS = `id, user_id AS "userId", registration, credential, direction, reader_type AS "readerType",
  granted, display_message AS "displayMessage", created_at AS "timestamp"`;

interface AccessLogRow {
  id: number;
  userId: number | null;
  registration: string | null;
  credential: string;
  direction: string;
  readerType: string;
  granted: boolean;
  displayMessage: string;
  timestamp: Date;
}

const toDirection = (value: string): AccessDirection =>
  value === 'ENTRY' || value === 'EXIT' ? value : 'UNKNOWN';

const toReaderType = (value: string): ReaderType =>
  value === 'BIOMETRIC' || value === 'KEYPAD' ? value : 'CARD';

const toLogRecord = (row: AccessLogRow): AccessLogRecord => ({
  ...row,
  direction: toDirection(row.direction),
  readerType: toReaderType(row.readerType)
});

export class PgAccessStore implements AccessStore {
  constructor(private readonly db: Queryable) {}

  private async rows<T extends QueryResultRow>(operation: string, text: string, params: unknown[]): Promise<T[]> {
    try {
      const { rows } = await this.db.query<T>(text, params);
      return rows;
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }

  async findCardByNumber(cardNumber: string): Promise<CardRecord | null> {
    const rows = await this.rows<CardRecord>(
      'findCardByNumber',
      `SELECT ${CARD_COLUMNS} FROM cards WHERE card_number = $1 LIMIT 1`,
      [cardNumber]
    );
    return rows[0] ?? null;
  }

  async findUserByRegistration(registration: string): Promise<UserRecord | null> {
    const rows = await this.rows<UserRecord>(
      'findUserByRegistration',
      `SELECT ${USER_COLUMNS} FROM users WHERE registration = $1 LIMIT 1`,
      [registration]
    );
    return rows[0] ?? null;
  }

  async findUserByCode(code: string): Promise<UserRecord | null> {
    const rows = await this.rows<UserRecord>(
      'findUserByCode',
      `SELECT ${USER_COLUMNS} FROM users WHERE code = $1 LIMIT 1`,
      [code]
    );
    return rows[0] ?? null;
  }

  async findRecentGrantedAccess(
    userId: number,
    direction: AccessDirection,
    since: Date
  ): Promise<AccessLogRecord | null> {
    const rows = await this.rows<AccessLogRow>(
      'findRecentGrantedAccess',
      `SELECT ${LOG_COLUMNS} FROM access_logs
       WHERE user_id = $1 AND direction = $2 AND granted = TRUE AND created_at >= $3
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [userId, direction, since]
    );
    return rows[0] ? toLogRecord(rows[0]) : null;
  }

  async appendAccessLog(entry: AccessLogEntry): Promise<AccessLogRecord> {
    const rows = await this.rows<AccessLogRow>(
      'appendAccessLog',
      `INSERT INTO access_logs (user_id, registration, credential, direction, reader_type, granted, display_message, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${LOG_COLUMNS}`,
      [
        entry.userId,
        entry.registration,
        entry.credential,
        entry.direction,
        entry.readerType,
        entry.granted,
        entry.displayMessage,
        entry.timestamp
      ]
    );

    const [row] = rows;
    if (!row) {
      throw new StoreUnavailableError('appendAccessLog', new Error('INSERT returned no row'));
    }
    return toLogRecord(row);
  }
}
