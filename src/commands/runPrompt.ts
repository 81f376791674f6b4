import { HubAgent, RunOutcome } from '../agents/HubAgent';
import { dbg } from '../utils';
import { printOutcome } from './ask';

/**
 * Runs a stored prompt the way the scheduler does: no history, nothing remembered.
 */
export async function runStoredPrompt(prompt: string, agent: HubAgent): Promise<RunOutcome> {
    if (!prompt.trim()) {
        throw new Error("No prompt provided for the 'run-prompt' command.");
    }
    dbg(`Running stored prompt: "${prompt}"`);
    const outcome = await agent.runScheduledPrompt(prompt);
    printOutcome(outcome);
    return outcome;
}
