export interface User {
  id: string;
  name: string;
  email: string;
  password: string;
  publicKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * An uploaded file. Key, payload and IV are ciphertext produced by the
 * client and are stored exactly as received.
 */
export interface StoredFile {
  id: string;
  ownerUserId: string | null;
  fileName: string;
  fileSize: number;
  encryptedKey: Buffer;
  encryptedPayload: Buffer;
  iv: Buffer;
  createdAt: Date;
}

export interface SharedLink {
  id: string;
  fileId: string;
  recipientUserId: string;
  password: string;
  expirationDate: Date;
  createdAt: Date;
}

export interface SentFileView {
  fileId: string;
  sharedLinkId: string;
  fileName: string;
  recipientEmail: string;
  expirationDate: Date;
  createdAt: Date;
}

export interface ReceivedFileView {
  fileId: string;
  sharedLinkId: string;
  fileName: string;
  senderEmail: string;
  expirationDate: Date;
  createdAt: Date;
}

export interface NewEncryptedFile {
  ownerId: string;
  fileName: string;
  fileSize: number;
  recipientId: string;
  accessPassword: string;
  expirationDate: Date;
  encryptedKey: Buffer;
  encryptedPayload: Buffer;
  iv: Buffer;
}

export interface StoredShare {
  fileId: string;
  sharedLinkId: string;
}

export interface Paginated<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface SweepResult {
  linksDeleted: number;
  filesDeleted: number;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
