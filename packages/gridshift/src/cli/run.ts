import { printHelp } from "./command/help-command.js";
import { annualizeCommand } from "./command/annualize-command.js";
import { calculateCommand } from "./command/calculate-command.js";
import { optimizeCommand } from "./command/optimize-command.js";
import { profileCommand } from "./command/profile-command.js";
import { regionsCommand } from "./command/regions-command.js";
import { serveCommand } from "./command/serve-command.js";

type CommandHandler = (argv: string[]) => Promise<void>;

const COMMANDS: ReadonlyMap<string, CommandHandler> = new Map([
    ["regions", regionsCommand],
    ["calculate", calculateCommand],
    ["profile", profileCommand],
    ["optimize", optimizeCommand],
    ["annualize", annualizeCommand],
    ["serve", serveCommand],
]);

export const VALID_COMMANDS: ReadonlySet<string> = new Set(["help", ...COMMANDS.keys()]);

/**
 * Dispatch one command line. Resolves to the process exit code; command errors reject.
 */
export async function run(argv: string[]): Promise<number> {
    const [command = "help", ...options] = argv;

    if (!VALID_COMMANDS.has(command)) {
        console.log(`[Message]: invalid command '${command}'`);
        printHelp();
        return 1;
    }

    const handler = COMMANDS.get(command);
    if (!handler) {
        printHelp();
        return 0;
    }

    await handler(options);
    return 0;
}
