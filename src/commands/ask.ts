import { HubAgent, RunOutcome } from '../agents/HubAgent';
import { CLI_CHAT_ID } from '../config';
import { dbg, say } from '../utils';

/**
 * Prints the outcome of one run, warnings first.
 */
export function printOutcome(outcome: RunOutcome): void {
    for (const warning of outcome.warnings) {
        console.warn(warning);
    }
    say(`Agent: ${outcome.text}`);
}

/**
 * Handles the 'ask' command: one message on the command-line chat.
 *
 * @returns The run outcome; the caller maps an aborted run to an exit code.
 */
export async function runAsk(inputText: string, agent: HubAgent, chatId: string = CLI_CHAT_ID): Promise<RunOutcome> {
    if (!inputText.trim()) {
        throw new Error("No input provided for the 'ask' command.");
    }
    dbg(`Asking agent on chat ${chatId}: "${inputText}"`);
    const outcome = await agent.handle(chatId, inputText);
    printOutcome(outcome);
    return outcome;
}
