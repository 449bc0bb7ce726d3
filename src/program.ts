import { Command, CommanderError, type OutputConfiguration } from "commander";
import { commitCommand, type CommitOptions } from "./commands/commit";

export type CommitRunner = (options: CommitOptions) => Promise<number>;

export interface CliFlags {
  force?: boolean;
  verbose?: boolean;
}

export function createProgram(
  action: (args: string[], flags: CliFlags) => Promise<void>,
  output?: OutputConfiguration
): Command {
  const program = new Command();

  program
    .name("committer")
    .description("Commit exactly the named files under one message")
    .version("1.0.0")
    .usage('[--force] "<commit message>" <file> [<file> ...]')
    .argument("[args...]", "Commit message followed by the files to commit")
    .option("-f, --force", "Remove a stale git lock file and retry the commit once")
    .option("-v, --verbose", "Print each step to stderr")
    // Options after the message are taken as file names
    .passThroughOptions()
    .exitOverride()
    .action(async (args: string[], flags: CliFlags) => {
      await action(args, flags);
    });

  if (output) {
    program.configureOutput(output);
  }
  return program;
}

export interface MainOptions {
  from?: "node" | "user";
  run?: CommitRunner;
  output?: OutputConfiguration;
}

/**
 * Parse argv and run the commit, resolving to the exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const { from = "node", run = commitCommand, output } = options;
  let exitCode = 0;

  const program = createProgram(async (args, flags) => {
    exitCode = await run({ args, force: flags.force, verbose: flags.verbose });
  }, output);

  try {
    await program.parseAsync(argv, { from });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed the message; help and version exit 0
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }
  return exitCode;
}
