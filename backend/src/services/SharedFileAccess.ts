import { NotFoundError, ValidationError } from '../errors';
import { SharedFileRepository } from '../database/models/File';
import { UserRepository } from '../database/models/User';
import { Clock, SharedLink, StoredFile, StoredShare, systemClock } from '../types';
import { PasswordHasher } from './passwordHasher';

export interface ShareFileInput {
  ownerId: string;
  recipientId: string;
  fileName: string;
  fileSize: number;
  accessPassword: string;
  expirationDate: Date;
  encryptedKey: Buffer;
  encryptedPayload: Buffer;
  iv: Buffer;
}

export type ShareAccessOutcome =
  | { status: 'granted'; link: SharedLink; file: StoredFile }
  | { status: 'not_found' }
  | { status: 'wrong_password' };

/**
 * Creates shares and decides whether a shared link may be opened.
 *
 * A link that does not exist, has expired, or belongs to another recipient
 * is reported as `not_found` in every case. `wrong_password` is only
 * reachable by the genuine recipient of a live link.
 */
export class SharedFileAccess {
  constructor(
    private readonly files: SharedFileRepository,
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly clock: Clock = systemClock
  ) {}

  async shareFile(input: ShareFileInput): Promise<StoredShare> {
    if (input.fileName.trim() === '') {
      throw new ValidationError('File name is required');
    }
    if (!Number.isSafeInteger(input.fileSize) || input.fileSize < 0) {
      throw new ValidationError('File size must be a non-negative integer');
    }
    if (input.accessPassword === '') {
      throw new ValidationError('Access password is required');
    }
    if (Number.isNaN(input.expirationDate.getTime()) || input.expirationDate.getTime() <= this.clock.now().getTime()) {
      throw new ValidationError('Expiration date must be in the future');
    }
    if (input.recipientId === input.ownerId) {
      throw new ValidationError('Files cannot be shared with yourself');
    }

    const recipient = await this.users.findUserById(input.recipientId);
    if (!recipient || recipient.publicKey === null) {
      throw new NotFoundError('Recipient not found');
    }

    const passwordHash = await this.hasher.hash(input.accessPassword);

    return this.files.storeEncryptedFile({
      ownerId: input.ownerId,
      fileName: input.fileName,
      fileSize: input.fileSize,
      recipientId: input.recipientId,
      accessPassword: passwordHash,
      expirationDate: input.expirationDate,
      encryptedKey: input.encryptedKey,
      encryptedPayload: input.encryptedPayload,
      iv: input.iv
    });
  }

  async openSharedFile(sharedId: string, recipientId: string, password: string): Promise<ShareAccessOutcome> {
    const link = await this.files.fetchSharedLink(sharedId, recipientId);
    if (!link) {
      return { status: 'not_found' };
    }

    const matches = await this.hasher.verify(password, link.password);
    if (!matches) {
      return { status: 'wrong_password' };
    }

    const file = await this.files.fetchFile(link.fileId);
    if (!file) {
      return { status: 'not_found' };
    }

    return { status: 'granted', link, file };
  }
}
