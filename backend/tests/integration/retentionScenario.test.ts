import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServices, Services } from '../../src/bootstrap';
import { loadConfig } from '../../src/config/config';
import { BcryptPasswordHasher } from '../../src/services/passwordHasher';
import { createTestPool, TestPool } from '../helpers/database';
import { FakeClock, HOUR } from '../helpers/clock';

describe('share, open and reap', () => {
  let pool: TestPool;
  let clock: FakeClock;
  let services: Services;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    pool = createTestPool();
    clock = new FakeClock();
    services = createServices(pool, loadConfig({}), { clock, hasher: new BcryptPasswordHasher(4) });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await pool.end();
  });

  it('reclaims a shared file once its link has expired', async () => {
    const { users, files, access, reaper } = services;
    const a = await users.createUser('a', 'a@x.com', 'hashed-test-password');
    const b = await users.createUser('b', 'b@x.com', 'hashed-test-password');
    await users.setUserPublicKey(b.id, 'b-public-key');

    const { fileId, sharedLinkId } = await access.shareFile({
      ownerId: a.id,
      recipientId: b.id,
      fileName: 'report.pdf',
      fileSize: 1024,
      accessPassword: 'secret1',
      expirationDate: new Date(clock.now().getTime() + HOUR),
      encryptedKey: Buffer.from('wrapped-key'),
      encryptedPayload: Buffer.alloc(1024, 7),
      iv: Buffer.from('initvector12')
    });

    const opened = await access.openSharedFile(sharedLinkId, b.id, 'secret1');
    expect(opened.status).toBe('granted');
    if (opened.status === 'granted') {
      expect(opened.file.fileName).toBe('report.pdf');
    }

    await pool.query('UPDATE shared_links SET expiration_date = $1 WHERE id = $2', [
      new Date(clock.now().getTime() - HOUR),
      sharedLinkId
    ]);

    expect(await reaper.runNow()).toEqual({ linksDeleted: 1, filesDeleted: 1 });
    expect(await files.fetchSharedLink(sharedLinkId, b.id)).toBeNull();
    expect(await files.fetchFile(fileId)).toBeNull();
    expect(reaper.getStatus().lastResult).toEqual({ linksDeleted: 1, filesDeleted: 1 });
  });
});
