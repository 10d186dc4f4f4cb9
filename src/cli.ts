import { Command, Option } from 'commander';
import { configCommand } from './commands/config.js';
import { authCommand } from './commands/auth.js';
import { whoamiCommand } from './commands/whoami.js';
import { rawCommand } from './commands/raw.js';
import { workbooksCommand } from './commands/workbooks.js';
import { datasetsCommand } from './commands/datasets.js';
import { membersCommand } from './commands/members.js';
import { teamsCommand } from './commands/teams.js';
import { connectionsCommand } from './commands/connections.js';
import { tagsCommand } from './commands/tags.js';
import { filesCommand } from './commands/files.js';
import { accountTypesCommand } from './commands/account-types.js';

export const cli = new Command();

cli
  .name('sigma')
  .description('Command-line client for the Sigma Computing REST API')
  .version('0.1.0');

// 全域選項
cli
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices(['json', 'table', 'csv']).default('json')
  )
  .option('--compact', 'Single-line JSON output')
  .option('-v, --verbose', 'Show configuration sources and request logs')
  .option('--client-id <id>', 'Sigma API client ID (env: SIGMA_CLIENT_ID)')
  .option('--secret <secret>', 'Sigma API secret (env: SIGMA_SECRET)')
  .option('--base-url <url>', 'Sigma API base URL (env: SIGMA_BASE_URL)')
  .option('--timeout <ms>', 'HTTP request timeout in milliseconds (env: SIGMA_TIMEOUT_MS)');

// 註冊指令
cli.addCommand(configCommand);
cli.addCommand(authCommand);
cli.addCommand(whoamiCommand);
cli.addCommand(rawCommand);
cli.addCommand(workbooksCommand);
cli.addCommand(datasetsCommand);
cli.addCommand(membersCommand);
cli.addCommand(teamsCommand);
cli.addCommand(connectionsCommand);
cli.addCommand(tagsCommand);
cli.addCommand(filesCommand);
cli.addCommand(accountTypesCommand);
