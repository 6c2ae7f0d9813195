#!/usr/bin/env node

import chalk from 'chalk';
import { config } from '../config/config';
import { DatabaseConnection } from '../database/connection';
import { SharedFileRepository } from '../database/models/File';
import { buildProgram } from './program';

async function main(): Promise<void> {
  const database = DatabaseConnection.fromConfig(config.database);

  try {
    const connected = await database.testConnection();
    if (!connected) {
      console.error(chalk.red('❌ Could not connect to database'));
      process.exitCode = 1;
      return;
    }

    await buildProgram(new SharedFileRepository(database.pool)).parseAsync(process.argv);
  } catch (error) {
    console.error(chalk.red('❌ Command failed:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await database.close();
  }
}

void main();
