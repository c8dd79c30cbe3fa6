import { parseCliArgs, usage, CliUsageError } from "./cli/args";
import { runCommand } from "./cli/commands";
import { errorMessage } from "./lib/errors";
import { setVerbose } from "./lib/log";

const run = async () => {
  const command = parseCliArgs(process.argv.slice(2));
  if ("verbose" in command) setVerbose(command.verbose);
  process.exitCode = await runCommand(command);
};

run().catch((error: unknown) => {
  console.error(`[tumorboard] fatal: ${errorMessage(error)}`);
  if (error instanceof CliUsageError) console.error(usage);
  process.exitCode = 1;
});
