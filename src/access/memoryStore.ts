import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { ConfigError } from '../errors.js';
import type {
  AccessDirection,
  AccessLogEntry,
  AccessLogRecord,
  AccessStore,
  CardRecord,
  UserRecord
} from '../types.js';

const optionalDate = z
  .union([z.string().datetime({ offset: true }), z.null()])
  .optional()
  .transform((value) => (value ? new Date(value) : null));

const SeedUserSchema = z.object({
  registration: z.string().min(1),
  name: z.string().default(''),
  active: z.boolean().default(true),
  validFrom: optionalDate,
  validUntil: optionalDate,
  allowCard: z.boolean().default(true),
  allowBiometric: z.boolean().default(false),
  allowKeypad: z.boolean().default(false),
  code: z.string().min(1).nullable().default(null)
});

const SeedCardSchema = z.object({
  cardNumber: z.string().min(1),
  registration: z.string().min(1),
  active: z.boolean().default(true),
  validFrom: optionalDate,
  validUntil: optionalDate
});

export const AccessSeedSchema = z.object({
  users: z.array(SeedUserSchema).default([]),
  cards: z.array(SeedCardSchema).default([])
});

export type AccessSeed = z.input<typeof AccessSeedSchema>;

/**
 * In-process access store. Backs the `memory` store driver and the tests;
 * records are kept in insertion order.
 */
export class MemoryAccessStore implements AccessStore {
  private readonly users: UserRecord[] = [];

  private readonly cards: CardRecord[] = [];

  private readonly logs: AccessLogRecord[] = [];

  private nextUserId = 1;

  private nextCardId = 1;

  private nextLogId = 1;

  static fromSeed(seed: AccessSeed): MemoryAccessStore {
    return MemoryAccessStore.fromParsedSeed(AccessSeedSchema.parse(seed));
  }

  private static fromParsedSeed(parsed: z.output<typeof AccessSeedSchema>): MemoryAccessStore {
    const store = new MemoryAccessStore();
    parsed.users.forEach((user) => store.addUser(user));
    parsed.cards.forEach((card) => store.addCard(card));
    return store;
  }

  static async fromFile(filePath: string): Promise<MemoryAccessStore> {
    const raw = await readFile(filePath, 'utf8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Access seed file ${filePath} is not valid JSON: ${String(error)}`);
    }

    const result = AccessSeedSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigError(`Access seed file ${filePath} is invalid: ${result.error.message}`);
    }
    return MemoryAccessStore.fromParsedSeed(result.data);
  }

  addUser(user: Omit<UserRecord, 'id'>): UserRecord {
    const record: UserRecord = { ...user, id: this.nextUserId };
    this.nextUserId += 1;
    this.users.push(record);
    return record;
  }

  /** Links the card to the user holding `registration`, or to user 0 if none exists yet. */
  addCard(card: Omit<CardRecord, 'id' | 'userId'> & { userId?: number }): CardRecord {
    const owner = this.users.find((user) => user.registration === card.registration);
    const record: CardRecord = {
      ...card,
      cardNumber: card.cardNumber.trim().toUpperCase(),
      id: this.nextCardId,
      userId: card.userId ?? owner?.id ?? 0
    };
    this.nextCardId += 1;
    this.cards.push(record);
    return record;
  }

  async findCardByNumber(cardNumber: string): Promise<CardRecord | null> {
    return this.cards.find((card) => card.cardNumber === cardNumber) ?? null;
  }

  async findUserByRegistration(registration: string): Promise<UserRecord | null> {
    return this.users.find((user) => user.registration === registration) ?? null;
  }

  async findUserByCode(code: string): Promise<UserRecord | null> {
    return this.users.find((user) => user.code !== null && user.code === code) ?? null;
  }

  async findRecentGrantedAccess(
    userId: number,
    direction: AccessDirection,
    since: Date
  ): Promise<AccessLogRecord | null> {
    for (let index = this.logs.length - 1; index >= 0; index -= 1) {
      const log = this.logs[index];
      if (
        log.userId === userId &&
        log.granted &&
        log.direction === direction &&
        log.timestamp.getTime() >= since.getTime()
      ) {
        return log;
      }
    }
    return null;
  }

  async appendAccessLog(entry: AccessLogEntry): Promise<AccessLogRecord> {
    const record: AccessLogRecord = { ...entry, id: this.nextLogId };
    this.nextLogId += 1;
    this.logs.push(record);
    return record;
  }

  listAccessLogs(): readonly AccessLogRecord[] {
    return [...this.logs];
  }
}
