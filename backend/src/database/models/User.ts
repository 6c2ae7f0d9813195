import { v4 as uuidv4 } from 'uuid';
import { DatabasePool } from '../pool';
import { ConflictError, NotFoundError, isUniqueViolation } from '../../errors';
import { Clock, User, systemClock } from '../../types';

interface UserRow {
  id: string;
  name: string;
  email: string;
  password: string;
  public_key: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

const USER_COLUMNS = 'id, name, email, password, public_key, created_at, updated_at';

export class UserRepository {
  constructor(
    private readonly pool: DatabasePool,
    private readonly clock: Clock = systemClock
  ) {}

  async createUser(name: string, email: string, passwordHash: string): Promise<User> {
    const now = this.clock.now();
    const query = `
      INSERT INTO users (id, name, email, password, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5, $5)
      RETURNING ${USER_COLUMNS}
    `;

    try {
      const result = await this.pool.query<UserRow>(query, [uuidv4(), name, email, passwordHash, now]);
      return this.mapRowToUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('A user with this email already exists');
      }
      throw error;
    }
  }

  async findUserById(id: string): Promise<User | null> {
    return this.findOne('id', id);
  }

  async findUserByName(name: string): Promise<User | null> {
    return this.findOne('name', name);
  }

  async findUserByEmail(email: string): Promise<User | null> {
    return this.findOne('email', email);
  }

  async updateUserName(id: string, name: string): Promise<User> {
    return this.updateColumn(id, 'name', name);
  }

  async updateUserPassword(id: string, passwordHash: string): Promise<User> {
    return this.updateColumn(id, 'password', passwordHash);
  }

  async setUserPublicKey(id: string, publicKey: string): Promise<void> {
    await this.updateColumn(id, 'public_key', publicKey);
  }

  /**
   * Candidate recipients: users whose email matches the LIKE pattern as
   * given, excluding the requester and anyone without a public key.
   */
  async searchUsersByEmailPrefix(requesterId: string, pattern: string): Promise<User[]> {
    const query = `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE email LIKE $1
      AND public_key IS NOT NULL
      AND id <> $2
      ORDER BY email
    `;

    const result = await this.pool.query<UserRow>(query, [pattern, requesterId]);
    return result.rows.map((row) => this.mapRowToUser(row));
  }

  private async findOne(column: 'id' | 'name' | 'email', value: string): Promise<User | null> {
    const query = `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1 LIMIT 1`;
    const result = await this.pool.query<UserRow>(query, [value]);

    if (result.rows.length === 0) {
      return null;
    }

    return this.mapRowToUser(result.rows[0]);
  }

  private async updateColumn(id: string, column: 'name' | 'password' | 'public_key', value: string): Promise<User> {
    const query = `
      UPDATE users
      SET ${column} = $1, updated_at = $2
      WHERE id = $3
      RETURNING ${USER_COLUMNS}
    `;

    const result = await this.pool.query<UserRow>(query, [value, this.clock.now(), id]);

    if (result.rows.length === 0) {
      throw new NotFoundError('User not found');
    }

    return this.mapRowToUser(result.rows[0]);
  }

  private mapRowToUser(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      email: row.email,
      password: row.password,
      publicKey: row.public_key,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }
}
