import { AppConfig } from './config/config';
import { SharedFileRepository } from './database/models/File';
import { UserRepository } from './database/models/User';
import { DatabasePool } from './database/pool';
import { RetentionReaper } from './jobs/retentionReaper';
import { BcryptPasswordHasher, PasswordHasher } from './services/passwordHasher';
import { SharedFileAccess } from './services/SharedFileAccess';
import { Clock, systemClock } from './types';

export interface Services {
  users: UserRepository;
  files: SharedFileRepository;
  access: SharedFileAccess;
  reaper: RetentionReaper;
}

export interface ServiceOverrides {
  clock?: Clock;
  hasher?: PasswordHasher;
}

/**
 * Wire the repositories, the access evaluator and the reaper over one pool.
 * The request layer receives these and nothing else touches the store.
 */
export function createServices(pool: DatabasePool, appConfig: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const hasher = overrides.hasher ?? new BcryptPasswordHasher(appConfig.sharing.passwordSaltRounds);

  const users = new UserRepository(pool, clock);
  const files = new SharedFileRepository(pool, clock);

  return {
    users,
    files,
    access: new SharedFileAccess(files, users, hasher, clock),
    reaper: new RetentionReaper(files, appConfig.retention)
  };
}
