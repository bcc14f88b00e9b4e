#!/usr/bin/env node

import { Command } from "commander";
import { loadQsConfig } from "../core/config-loader";
import {
  addStandardSettings,
  addTarget,
  initProject,
  initSubProject,
} from "../core/project";
import {
  buildProject,
  openDocumentation,
  runTarget,
} from "../core/build-runner";
import { formatTargetListing, listTargets } from "../core/list-targets";
import { parseCxxStandard, type CxxStandard, type ResolvedQsConfig } from "../schema";
import { isQsError } from "../util/errors";
import { defaultLogger, type Logger } from "../util/logger";
import { VERSION } from "../version";

interface BaseCliOptions {
  config?: string;
  quiet?: boolean;
  debug?: boolean;
  strict?: boolean;
}

interface AddCliOptions {
  library?: boolean;
}

interface CliContext {
  cwd: string;
  config: ResolvedQsConfig;
  logger: Logger;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

/**
 * Load config and run one command. Reported failures (QsError) are printed;
 * they only change the exit status under --strict. Anything else propagates
 * to the top-level handler.
 */
async function execute(
  cwd: string,
  opts: BaseCliOptions,
  fn: (ctx: CliContext) => Promise<void> | void,
): Promise<void> {
  const logger = createCliLogger(opts);

  try {
    const { config, configPath } = await loadQsConfig(cwd, {
      configPath: opts.config,
    });
    logger.debug(`cwd=${cwd}, config=${configPath ?? "defaults"}`);
    await fn({ cwd, config, logger });
  } catch (err) {
    if (!isQsError(err)) throw err;

    logger.error(`Error: ${err.message}`);
    for (const hint of err.hints) {
      logger.info(hint);
    }
    if (opts.strict) {
      process.exitCode = 1;
    }
  }
}

function parseStandardArg(value: string | undefined, logger: Logger): CxxStandard | undefined {
  if (value === undefined) return undefined;
  const parsed = parseCxxStandard(value);
  if (parsed === undefined) {
    logger.warn("Invalid C++ standard, using default");
    return undefined;
  }
  return parsed;
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("qs")
    .description("qs – quick setup for CMake projects")
    .version(VERSION)
    .option("-c, --config <path>", "Path to a qs.config.* file")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging")
    .option("--strict", "Exit with status 1 when a command reports an error");

  // init / init sub <name>
  const init = program
    .command("init")
    .description("Initialize a new CMake project in the current directory")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, ({ config }) => {
        initProject({ cwd, config });
      });
    });

  init
    .command("sub")
    .description("Create a library sub-project in <name>/ and link it into the project")
    .argument("[name]", "Sub-project directory name")
    .action(async (name: string | undefined, _opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, ({ config }) => {
        initSubProject(name ?? "", { cwd, config });
      });
    });

  program
    .command("add")
    .description("Add an executable or library target, or add files to an existing one")
    .argument("<target>", "Target name")
    .argument("[files...]", "Source files, directories or glob patterns like *.cpp")
    .option("-l, --library", "Declare the target with add_library")
    .action(async (target: string, files: string[], addOpts: AddCliOptions, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, ({ config }) => {
        addTarget(target, files, {
          cwd,
          config,
          kind: addOpts.library ? "library" : "executable",
        });
      });
    });

  program
    .command("std")
    .description("Add standard CMake configuration with an optional C++ standard (11/14/17/20/23)")
    .argument("[standard]", "C++ standard")
    .action(async (standard: string | undefined, _opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, ({ config, logger }) => {
        addStandardSettings({
          cwd,
          config,
          standard: parseStandardArg(standard, logger),
        });
      });
    });

  program
    .command("build")
    .description("Create the build directory, run cmake and the build tool")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, async ({ config }) => {
        await buildProject({ cwd, config });
      });
    });

  program
    .command("run")
    .description("Run an executable target (or the only one built)")
    .argument("[target]", "Executable name")
    .action(async (target: string | undefined, _opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, async ({ config }) => {
        await runTarget(target, { cwd, config });
      });
    });

  program
    .command("list")
    .description("List all targets declared in the project")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, ({ config }) => {
        const listing = listTargets({ cwd, config });
        process.stdout.write(formatTargetListing(listing) + "\n");
      });
    });

  program
    .command("doc")
    .description("Open the CMake documentation in the default browser")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.optsWithGlobals<BaseCliOptions>();
      await execute(cwd, baseOpts, async ({ config }) => {
        await openDocumentation({ config });
      });
    });

  program
    .command("version")
    .description("Show version information")
    .action(() => {
      process.stdout.write(`qs version ${VERSION}\n`);
    });

  // No command, or one we don't know: print usage, touch nothing.
  program
    .argument("[command]")
    .action((command: string | undefined) => {
      if (command) {
        defaultLogger.error(`Unknown command: ${command}`);
      }
      program.outputHelp();
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
