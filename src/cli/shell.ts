import inquirer from 'inquirer';
import { AppContext } from '../app';
import { CLI_CHAT_ID } from '../config';
import { printOutcome } from '../commands/ask';
import { runAliases } from '../commands/aliases';
import { runRefresh } from '../commands/refresh';
import { dbg, errorMessage, say } from '../utils';

const EXIT_COMMAND = 'exit';
const RESET_COMMAND = '/reset';
const ALIASES_COMMAND = '/aliases';
const REFRESH_COMMAND = '/refresh';
const USAGE_COMMAND = '/usage';

export type PromptFn = () => Promise<string>;

/**
 * Prompts the user for the next line in the interactive shell.
 */
export async function getCommandInput(): Promise<string> {
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: 'hub> ' }
    ]);
    return answers.command.trim();
}

/**
 * Parses a command line input string into a command and arguments.
 *
 * Handles quoted arguments by preserving spaces within quotes and removing the quotes.
 * For example: `/aliases --remove "foyer light"` becomes:
 * - command: "/aliases"
 * - args: ["--remove", "foyer light"]
 *
 * @returns The first word lower-cased, and the remaining arguments with quotes stripped
 */
export function parseCommand(commandInput: string): { command: string, args: string[] } {
    const parts = commandInput.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
    const command = parts[0]?.toLowerCase() || '';
    const args = parts.slice(1).map((arg: string) =>
        (arg.startsWith('"') && arg.endsWith('"')) || (arg.startsWith("'") && arg.endsWith("'"))
        ? arg.slice(1, -1)
        : arg
    );
    return { command, args };
}

/**
 * Runs one shell line. Anything that is not a shell command goes to the agent.
 *
 * @returns false when the shell should exit
 */
export async function handleShellInput(app: AppContext, commandInput: string, chatId: string = CLI_CHAT_ID): Promise<boolean> {
    if (commandInput === '') {
        return true;
    }
    const { command, args } = parseCommand(commandInput);

    switch (command) {
        case EXIT_COMMAND:
            say('Exiting...');
            return false;
        case RESET_COMMAND:
            app.agent.resetConversation(chatId);
            say('Conversation cleared.');
            return true;
        case ALIASES_COMMAND:
            await runAliases(app.aliases, args[0] === '--remove' ? args.slice(1).join(' ') : undefined);
            return true;
        case REFRESH_COMMAND:
            await runRefresh(app.cache);
            return true;
        case USAGE_COMMAND:
            say(app.usage.summary());
            return true;
        default:
            printOutcome(await app.agent.handle(chatId, commandInput));
            return true;
    }
}

/**
 * Starts an interactive REPL on the command-line chat.
 *
 * Commands: `exit`, `/reset`, `/aliases [--remove <nickname>]`, `/refresh`, `/usage`;
 * any other input is a message for the agent.
 */
export async function startShell(app: AppContext, prompt: PromptFn = getCommandInput): Promise<void> {
    say('Starting interactive shell. Type "exit" to quit.');
    say(`Available commands: ${[EXIT_COMMAND, RESET_COMMAND, `${ALIASES_COMMAND} [--remove <nickname>]`, REFRESH_COMMAND, USAGE_COMMAND].join(', ')}`);

    let shellRunning = true;
    while (shellRunning) {
        const commandInput = await prompt();
        try {
            shellRunning = await handleShellInput(app, commandInput);
        } catch (error) {
            console.error(`Command failed: ${errorMessage(error)}`);
            dbg(`Shell error detail: ${String(error)}`);
        }
    }
}
