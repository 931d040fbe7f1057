import { Command } from 'commander';
import { LinkMode } from '@metadata-writer/shared';
import { ApiService, DEFAULT_POLL_INTERVAL_MS, parseInterval, resolveServerUrl } from './services';
import { runCommand } from './commands/run';
import { statusCommand } from './commands/status';
import { healthCommand } from './commands/health';

const program = new Command();

program
  .name('metadata-writer')
  .description('Upload a video and get titles, description and tags back')
  .version('1.0.0')
  .option('-s, --server <url>', 'server base URL (default: $METADATA_SERVER_URL or http://127.0.0.1:8787)');

const apiFor = () => new ApiService(resolveServerUrl(program.opts<{ server?: string }>().server));

program
  .command('run')
  .description('Upload a media file and wait for its metadata')
  .argument('<file>', 'video or audio file (mp4, m4a, wav, webm)')
  .option('-m, --link-mode <mode>', `one of: ${Object.values(LinkMode).join(', ')}`, LinkMode.CHECKED_NO_LINKS)
  .option('-l, --links-file <path>', 'text file with one URL per line')
  .option('-i, --interval <ms>', 'poll interval in milliseconds', parseInterval, DEFAULT_POLL_INTERVAL_MS)
  .action(async (file: string, opts: { linkMode: string; linksFile?: string; interval: number }) => {
    process.exitCode = await runCommand(apiFor(), file, {
      linkMode: opts.linkMode,
      linksFile: opts.linksFile,
      intervalMs: opts.interval
    });
  });

program
  .command('status')
  .description('Print the current state of a job')
  .argument('<jobId>')
  .action(async (jobId: string) => {
    process.exitCode = await statusCommand(apiFor(), jobId);
  });

program
  .command('health')
  .description('Check the server and its dependencies')
  .action(async () => {
    process.exitCode = await healthCommand(apiFor());
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌ An unexpected error occurred:', error);
  process.exitCode = 1;
});
