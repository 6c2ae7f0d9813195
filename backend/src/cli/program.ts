import { Command } from 'commander';
import chalk from 'chalk';
import { SharedFileRepository } from '../database/models/File';

export function buildProgram(files: SharedFileRepository): Command {
  const program = new Command();

  program
    .name('sealdrop-reaper')
    .description('Reclaim expired shared links and their files');

  program
    .command('sweep')
    .description('Delete expired shared links and the files they referenced')
    .action(async () => {
      const result = await files.deleteExpiredLinks();
      if (result.linksDeleted === 0) {
        console.log(chalk.gray('No expired shared links to delete'));
        return;
      }
      console.log(chalk.green(`✅ Deleted ${result.linksDeleted} shared link(s) and ${result.filesDeleted} file(s)`));
    });

  program
    .command('pending')
    .description('Count expired shared links waiting for the next sweep')
    .action(async () => {
      const count = await files.countExpiredLinks();
      console.log(chalk.cyan(`${count} expired shared link(s) pending`));
    });

  return program;
}
