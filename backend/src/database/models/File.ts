import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { DatabaseClient, DatabasePool } from '../pool';
import { withTransaction } from '../transaction';
import { PageRequest, toPageWindow, toPaginated } from '../../services/pagination';
import {
  Clock,
  NewEncryptedFile,
  Paginated,
  ReceivedFileView,
  SentFileView,
  SharedLink,
  StoredFile,
  StoredShare,
  SweepResult,
  systemClock
} from '../../types';

interface FileRow {
  id: string;
  user_id: string | null;
  file_name: string;
  file_size: number | string;
  encrypted_aes_key: Buffer;
  encrypted_file: Buffer;
  iv: Buffer;
  created_at: Date | string;
}

interface SharedLinkRow {
  id: string;
  file_id: string;
  recipient_user_id: string;
  password: string;
  expiration_date: Date | string;
  created_at: Date | string;
}

interface FileViewRow {
  file_id: string;
  shared_link_id: string;
  file_name: string;
  counterpart_email: string;
  expiration_date: Date | string;
  created_at: Date | string;
}

interface CountRow {
  total: number | string;
}

// Keeps IN (...) lists well below the protocol's parameter limit
const DELETE_BATCH_SIZE = 500;

function placeholders(count: number, startAt: number = 1): string {
  return Array.from({ length: count }, (_, i) => `$${startAt + i}`).join(', ');
}

function chunk<T>(values: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    batches.push(values.slice(i, i + size));
  }
  return batches;
}

/**
 * Files and the shared links that grant access to them. A file is always
 * written together with its link, and links are always removed before the
 * files they point at.
 */
export class SharedFileRepository {
  constructor(
    private readonly pool: DatabasePool,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Insert the file row and its shared link as one unit.
   */
  async storeEncryptedFile(data: NewEncryptedFile): Promise<StoredShare> {
    const fileId = uuidv4();
    const sharedLinkId = uuidv4();
    const createdAt = this.clock.now();

    await withTransaction(this.pool, `Storing file ${fileId}`, async (client) => {
      await client.query(
        `
          INSERT INTO files (id, user_id, file_name, file_size, encrypted_aes_key, encrypted_file, iv, created_at)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        `,
        [
          fileId,
          data.ownerId,
          data.fileName,
          data.fileSize,
          data.encryptedKey,
          data.encryptedPayload,
          data.iv,
          createdAt
        ]
      );

      await client.query(
        `
          INSERT INTO shared_links (id, file_id, recipient_user_id, password, expiration_date, created_at)
          VALUES ($1, $2, $3, $4, $5, $6)
        `,
        [sharedLinkId, fileId, data.recipientId, data.accessPassword, data.expirationDate, createdAt]
      );
    });

    return { fileId, sharedLinkId };
  }

  /**
   * A link is visible only to its recipient and only before it expires.
   * Unknown or malformed id, foreign recipient and expiry all give the
   * same `null`.
   */
  async fetchSharedLink(sharedId: string, recipientId: string): Promise<SharedLink | null> {
    if (!isUuid(sharedId) || !isUuid(recipientId)) {
      return null;
    }

    const query = `
      SELECT id, file_id, recipient_user_id, password, expiration_date, created_at
      FROM shared_links
      WHERE id = $1
      AND recipient_user_id = $2
      AND expiration_date > $3
    `;

    const result = await this.pool.query<SharedLinkRow>(query, [sharedId, recipientId, this.clock.now()]);

    if (result.rows.length === 0) {
      return null;
    }

    return this.mapRowToSharedLink(result.rows[0]);
  }

  async fetchFile(fileId: string): Promise<StoredFile | null> {
    if (!isUuid(fileId)) {
      return null;
    }

    const query = `
      SELECT id, user_id, file_name, file_size, encrypted_aes_key, encrypted_file, iv, created_at
      FROM files
      WHERE id = $1
    `;

    const result = await this.pool.query<FileRow>(query, [fileId]);

    if (result.rows.length === 0) {
      return null;
    }

    return this.mapRowToFile(result.rows[0]);
  }

  async listSentFiles(ownerId: string, request: PageRequest): Promise<Paginated<SentFileView>> {
    const from = `
      FROM shared_links sl
      JOIN files f ON sl.file_id = f.id
      JOIN users u ON sl.recipient_user_id = u.id
      WHERE f.user_id = $1
    `;

    const page = await this.listViews(from, ownerId, request);
    return {
      ...page,
      items: page.items.map((row) => ({
        fileId: row.file_id,
        sharedLinkId: row.shared_link_id,
        fileName: row.file_name,
        recipientEmail: row.counterpart_email,
        expirationDate: new Date(row.expiration_date),
        createdAt: new Date(row.created_at)
      }))
    };
  }

  async listReceivedFiles(recipientId: string, request: PageRequest): Promise<Paginated<ReceivedFileView>> {
    const from = `
      FROM shared_links sl
      JOIN files f ON sl.file_id = f.id
      JOIN users u ON f.user_id = u.id
      WHERE sl.recipient_user_id = $1
    `;

    const page = await this.listViews(from, recipientId, request);
    return {
      ...page,
      items: page.items.map((row) => ({
        fileId: row.file_id,
        sharedLinkId: row.shared_link_id,
        fileName: row.file_name,
        senderEmail: row.counterpart_email,
        expirationDate: new Date(row.expiration_date),
        createdAt: new Date(row.created_at)
      }))
    };
  }

  async countExpiredLinks(): Promise<number> {
    const result = await this.pool.query<CountRow>(
      'SELECT COUNT(*) AS total FROM shared_links WHERE expiration_date < $1',
      [this.clock.now()]
    );
    return Number(result.rows[0].total);
  }

  /**
   * Remove expired links, then the files they referenced that no other
   * link still points at. Both deletes share one transaction.
   */
  async deleteExpiredLinks(): Promise<SweepResult> {
    const expired = await this.pool.query<{ id: string; file_id: string }>(
      'SELECT id, file_id FROM shared_links WHERE expiration_date < $1',
      [this.clock.now()]
    );

    if (expired.rows.length === 0) {
      return { linksDeleted: 0, filesDeleted: 0 };
    }

    const linkIds = expired.rows.map((row) => row.id);
    const fileIds = [...new Set(expired.rows.map((row) => row.file_id))];

    return withTransaction(this.pool, 'Expired link sweep', async (client) => {
      const linksDeleted = await this.deleteByIds(client, 'shared_links', linkIds);

      const referenced = new Set<string>();
      for (const batch of chunk(fileIds, DELETE_BATCH_SIZE)) {
        const result = await client.query<{ file_id: string }>(
          `SELECT DISTINCT file_id FROM shared_links WHERE file_id IN (${placeholders(batch.length)})`,
          batch
        );
        result.rows.forEach((row) => referenced.add(row.file_id));
      }

      const unreferenced = fileIds.filter((id) => !referenced.has(id));
      const filesDeleted = await this.deleteByIds(client, 'files', unreferenced);

      return { linksDeleted, filesDeleted };
    });
  }

  private async deleteByIds(client: DatabaseClient, table: 'shared_links' | 'files', ids: string[]): Promise<number> {
    let deleted = 0;
    for (const batch of chunk(ids, DELETE_BATCH_SIZE)) {
      const result = await client.query<{ id: string }>(
        `DELETE FROM ${table} WHERE id IN (${placeholders(batch.length)}) RETURNING id`,
        batch
      );
      deleted += result.rows.length;
    }
    return deleted;
  }

  private async listViews(from: string, userId: string, request: PageRequest): Promise<Paginated<FileViewRow>> {
    // Validated integers, safe to inline
    const window = toPageWindow(request);

    const rows = await this.pool.query<FileViewRow>(
      `
        SELECT
          f.id AS file_id,
          sl.id AS shared_link_id,
          f.file_name,
          u.email AS counterpart_email,
          sl.expiration_date,
          sl.created_at
        ${from}
        ORDER BY sl.created_at DESC, sl.id DESC
        LIMIT ${window.limit}
        OFFSET ${window.offset}
      `,
      [userId]
    );

    const count = await this.pool.query<CountRow>(`SELECT COUNT(*) AS total ${from}`, [userId]);

    return toPaginated(rows.rows, Number(count.rows[0].total), window);
  }

  private mapRowToFile(row: FileRow): StoredFile {
    return {
      id: row.id,
      ownerUserId: row.user_id,
      fileName: row.file_name,
      fileSize: Number(row.file_size),
      encryptedKey: row.encrypted_aes_key,
      encryptedPayload: row.encrypted_file,
      iv: row.iv,
      createdAt: new Date(row.created_at)
    };
  }

  private mapRowToSharedLink(row: SharedLinkRow): SharedLink {
    return {
      id: row.id,
      fileId: row.file_id,
      recipientUserId: row.recipient_user_id,
      password: row.password,
      expirationDate: new Date(row.expiration_date),
      createdAt: new Date(row.created_at)
    };
  }
}
