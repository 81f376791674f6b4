#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { AppContext, AppOptions, createApp } from './app';
import { ConfigError, loadConfig } from './config';
import { dbg, errorMessage, say } from './utils';
import { runAsk } from './commands/ask';
import { runStoredPrompt } from './commands/runPrompt';
import { runAliases } from './commands/aliases';
import { runRefresh } from './commands/refresh';
import { startShell } from './cli/shell';

const GENERAL_ERROR = 1;
const ASK_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

type GlobalOptions = {
  config?: string;
  dataDir?: string;
  model?: string;
};

/**
 * Builds the application from the global options, runs `action`, then shuts down.
 * Configuration problems are reported without a stack trace.
 */
async function withApp(
  program: Command,
  action: (app: AppContext) => Promise<number>,
  appOptions: AppOptions = {}
): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  let app: AppContext;
  try {
    const config = await loadConfig({ configPath: globalOpts.config, dataDir: globalOpts.dataDir, model: globalOpts.model });
    app = await createApp(config, appOptions);
  } catch (error) {
    console.error(error instanceof ConfigError ? error.message : `Startup failed: ${errorMessage(error)}`);
    process.exit(GENERAL_ERROR);
  }

  try {
    process.exitCode = await action(app);
  } finally {
    app.close();
  }
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('hubagent')
    .version('1.0.0')
    .description('Chat with your home-automation hub (CLI Mode)')
    .option('-c, --config <path>', 'Path to a JSON configuration file')
    .option('-d, --data-dir <path>', 'Directory for learned aliases and usage data')
    .option('-m, --model <model_name>', 'AI model to use');

  // --- Define Commands ---

  program
    .command('ask')
    .description('Send one message to the agent')
    .argument('<input...>', 'The instruction or question for the agent')
    .action(async (inputParts: string[]) => {
      try {
        await withApp(program, async app => {
          const outcome = await runAsk(inputParts.join(' '), app.agent);
          return outcome.kind === 'completed' ? 0 : ASK_ERROR;
        });
      } catch (error) {
        console.error(`Ask command failed: ${errorMessage(error)}`);
        process.exit(ASK_ERROR);
      }
    });

  program
    .command('shell')
    .description('Start an interactive chat with the agent')
    .action(async () => {
      await withApp(program, async app => {
        await startShell(app);
        return 0;
      }, { backgroundRefresh: true });
    });

  program
    .command('run-prompt')
    .description('Run a stored prompt without conversation history, as the scheduler does')
    .argument('<input...>', 'The stored prompt text')
    .action(async (inputParts: string[]) => {
      try {
        await withApp(program, async app => {
          const outcome = await runStoredPrompt(inputParts.join(' '), app.agent);
          return outcome.kind === 'completed' ? 0 : ASK_ERROR;
        });
      } catch (error) {
        console.error(`run-prompt command failed: ${errorMessage(error)}`);
        process.exit(ASK_ERROR);
      }
    });

  program
    .command('aliases')
    .description('List learned entity aliases')
    .option('-r, --remove <nickname>', 'Forget an alias')
    .action(async (options: { remove?: string }) => {
      await withApp(program, async app => (await runAliases(app.aliases, options.remove)) ? 0 : GENERAL_ERROR);
    });

  program
    .command('refresh')
    .description('Reload the entity list from the hub')
    .action(async () => {
      try {
        await withApp(program, async app => {
          await runRefresh(app.cache);
          return 0;
        });
      } catch (error) {
        console.error(`Refresh failed: ${errorMessage(error)}`);
        process.exit(GENERAL_ERROR);
      }
    });

  program
    .command('check')
    .description('Check that the hub is reachable with the configured token')
    .action(async () => {
      await withApp(program, async app => {
        const reachable = await app.hub.checkConnection();
        say(reachable ? `Hub at ${app.config.hub.url} is reachable.` : `Hub at ${app.config.hub.url} is not reachable.`);
        return reachable ? 0 : GENERAL_ERROR;
      });
    });

  // --- Parse and Execute ---
  try {
    if (process.argv.length <= 2) {
      program.help();
    }
    await program.parseAsync(process.argv);
    dbg('Command execution finished.');
  } catch (error) {
    // Errors during parsing itself (e.g., invalid options)
    console.error(`Error during command parsing or execution: ${errorMessage(error)}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

main().catch(error => {
  say(`Unhandled application error: ${errorMessage(error)}`);
  process.exit(UNHANDLED_ERROR);
});
