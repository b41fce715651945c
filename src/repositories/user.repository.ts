import { randomUUID } from 'crypto';
import type { Knex } from 'knex';
import logger from '../config/logger';
import type { User } from '../types/order';
import { AppError } from '../utils/AppError';
import type { UserRepository } from './types';

interface UserRow {
  id: string;
  phone_number: string;
  name: string | null;
  created_at: Date;
}

/**
 * KnexUserRepository keeps one customer record per chat phone
 */
export class KnexUserRepository implements UserRepository {
  constructor(private readonly db: Knex) {}

  async getOrCreateByPhone(phoneNumber: string, name?: string): Promise<User> {
    // Concurrent first messages from the same phone must not create two users
    await this.db<UserRow>('users')
      .insert({
        id: randomUUID(),
        phone_number: phoneNumber,
        name: name ?? null,
        created_at: new Date(),
      })
      .onConflict('phone_number')
      .ignore();

    const row = await this.db<UserRow>('users').where({ phone_number: phoneNumber }).first();
    if (!row) {
      throw new AppError(`User for ${phoneNumber} could not be loaded`, 500);
    }

    logger.debug(`User resolved: ${row.id} (${phoneNumber})`);

    return {
      id: row.id,
      phoneNumber: row.phone_number,
      name: row.name,
      createdAt: row.created_at,
    };
  }
}
