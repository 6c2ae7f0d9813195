import type { SharedFileRepository } from '../../src/database/models/File';
import type { UserRepository } from '../../src/database/models/User';
import type { NewEncryptedFile, StoredShare, User } from '../../src/types';
import { HOUR } from './clock';

export async function createUser(
  users: UserRepository,
  email: string,
  options: { name?: string; publicKey?: string } = {}
): Promise<User> {
  const user = await users.createUser(options.name ?? email.split('@')[0], email, 'hashed-test-password');
  if (options.publicKey !== undefined) {
    await users.setUserPublicKey(user.id, options.publicKey);
  }
  return user;
}

export function encryptedFileFor(
  owner: User,
  recipient: User,
  now: Date,
  overrides: Partial<NewEncryptedFile> = {}
): NewEncryptedFile {
  return {
    ownerId: owner.id,
    fileName: 'report.pdf',
    fileSize: 1024,
    recipientId: recipient.id,
    accessPassword: 'stored-access-secret',
    expirationDate: new Date(now.getTime() + HOUR),
    encryptedKey: Buffer.from([1, 2, 3, 4]),
    encryptedPayload: Buffer.from('opaque ciphertext bytes'),
    iv: Buffer.from([9, 8, 7, 6, 5, 4, 3, 2, 1, 0, 1, 2]),
    ...overrides
  };
}

export async function storeFile(
  files: SharedFileRepository,
  owner: User,
  recipient: User,
  now: Date,
  overrides: Partial<NewEncryptedFile> = {}
): Promise<StoredShare> {
  return files.storeEncryptedFile(encryptedFileFor(owner, recipient, now, overrides));
}
