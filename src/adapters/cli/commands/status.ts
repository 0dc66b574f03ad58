import { Command } from 'commander';
import { DEFAULTS, StateManager, createConsoleLogger } from '../../../core/index.js';

export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show which videos have already been notified')
    .option('-s, --state <file>', 'processed-videos state file', process.env.STATE_PATH ?? DEFAULTS.statePath)
    .option('-n, --limit <number>', 'recent entries to list', '10')
    .action(async (options: { state: string; limit: string }) => {
      const stateManager = new StateManager(options.state, createConsoleLogger());
      const processed = await stateManager.load();
      const stats = stateManager.getStats(processed);

      console.log('');
      console.log(`State file:        ${stateManager.getPath()}`);
      console.log(`Notified videos:   ${stats.total}`);
      console.log(`Last notification: ${stats.lastNotifiedAt ?? '-'}`);

      const limit = Number.parseInt(options.limit, 10);
      const recent = stateManager.recent(processed, Number.isNaN(limit) ? 10 : limit);
      if (recent.length > 0) {
        console.log('\nRecent:');
        for (const entry of recent) {
          console.log(`  ${entry.notifiedAt}  ${entry.videoId}  ${entry.title}`);
        }
      }
    });

  return command;
}
