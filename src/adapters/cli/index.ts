import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';

export function createCLI(): Command {
  const program = new Command()
    .name('channel-digest')
    .description('Summarize new YouTube channel uploads with Gemini and post them to Telegram')
    .version('1.0.0');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createStatusCommand());

  return program;
}
