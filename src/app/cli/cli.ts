// Command-line front end for pathpick

import type { SortMode } from "../../domain/entities";
import { AppError, SORT_MODES, describeError, parseSortMode } from "../../domain/entities";
import type { FileSystem, Logger } from "../../domain/ports";
import { createStderrLogger } from "../../infrastructure/logger";
import { VERSION } from "../../version";
import { list, record } from "../projects";

/**
 * Process state the CLI reads and writes. Tests supply their own.
 */
export interface CliContext {
  /** Writes to stdout */
  write(text: string): void;
  /** Receives diagnostics; defaults to a stderr logger */
  logger?: Logger;
  fileSystem?: FileSystem;
  cwd?: string;
  homeDir?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Parsed CLI flags from command line arguments
 */
interface ParsedFlags {
  /** Sort mode override */
  sort?: SortMode;
  /** Config file path */
  config?: string;
  /** Show help message */
  help: boolean;
  /** Show debug output */
  verbose: boolean;
  /** Remaining positional arguments */
  remaining: string[];
}

/**
 * Parse CLI flags from command line arguments
 * @param args - Arguments after the command name
 * @throws AppError INVALID_ARGUMENT for unknown flags or bad values
 */
function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    help: false,
    verbose: false,
    remaining: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--verbose" || arg === "-v") {
      flags.verbose = true;
    } else if (arg === "--sort" || arg === "-s") {
      const value = args[++i];
      const mode = value === undefined ? null : parseSortMode(value);
      if (mode === null) {
        throw new AppError(
          "INVALID_ARGUMENT",
          `Invalid sort mode: ${value ?? "(missing)"}. Expected one of: ${SORT_MODES.join(", ")}`
        );
      }
      flags.sort = mode;
    } else if (arg === "--config" || arg === "-c") {
      const value = args[++i];
      if (!value) {
        throw new AppError("INVALID_ARGUMENT", "--config requires a file path");
      }
      flags.config = value;
    } else if (arg === "--") {
      flags.remaining.push(...args.slice(i + 1));
      break;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new AppError("INVALID_ARGUMENT", `Unknown option: ${arg}`);
    } else {
      flags.remaining.push(arg);
    }
  }

  return flags;
}

const MAIN_HELP = `
pathpick v${VERSION} - List project directories for a fuzzy picker

Usage:
  pathpick [command] [options]

Commands:
  list       Print every project path, one per line (default)
  record     Remember that a project was just opened

Options:
  -h, --help     Show help for a command
  --version      Show version number

Examples:
  pathpick | fzf | xargs pathpick record
  pathpick list --sort recent

Run 'pathpick <command> --help' for more information.
`;

const LIST_HELP = `
pathpick list - Print every project path, one per line

Usage:
  pathpick list [options]

Options:
  -s, --sort <mode>      alphabetical or recent (default: from config)
  -c, --config <path>    Config file (default: $XDG_CONFIG_HOME/pathpick/config.json)
  -v, --verbose          Show debug output on stderr
  -h, --help             Show this help message
`;

const RECORD_HELP = `
pathpick record - Remember that a project was just opened

Usage:
  pathpick record <path> [options]

Options:
  -c, --config <path>    Config file (default: $XDG_CONFIG_HOME/pathpick/config.json)
  -v, --verbose          Show debug output on stderr
  -h, --help             Show this help message
`;

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the executable name
 * @returns Process exit code
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const first = argv[0];
  const hasCommand = first !== undefined && !first.startsWith("-");
  const command = hasCommand ? first : "list";
  const rest = hasCommand ? argv.slice(1) : argv;

  if (first === "--version") {
    context.write(`pathpick v${VERSION}\n`);
    return 0;
  }

  let logger = context.logger ?? createStderrLogger();

  try {
    const flags = parseFlags(rest);
    logger = context.logger ?? createStderrLogger({ verbose: flags.verbose });

    const options = {
      configPath: flags.config,
      cwd: context.cwd,
      homeDir: context.homeDir,
      env: context.env,
      fileSystem: context.fileSystem,
      logger,
    };

    switch (command) {
      case "list": {
        if (flags.help) {
          context.write(hasCommand ? LIST_HELP : MAIN_HELP);
          return 0;
        }
        if (flags.remaining.length > 0) {
          throw new AppError("INVALID_ARGUMENT", `Unexpected argument: ${flags.remaining[0]}`);
        }

        const projects = await list({ ...options, sortMode: flags.sort });
        if (projects.length === 0) {
          logger.error("No projects found");
          return 1;
        }
        context.write(projects.map((p) => `${p}\n`).join(""));
        return 0;
      }

      case "record": {
        if (flags.help) {
          context.write(RECORD_HELP);
          return 0;
        }
        const [projectPath, ...extra] = flags.remaining;
        if (projectPath === undefined || projectPath.trim() === "") {
          throw new AppError("INVALID_ARGUMENT", "record requires a project path");
        }
        if (extra.length > 0) {
          throw new AppError("INVALID_ARGUMENT", `Unexpected argument: ${extra[0]}`);
        }

        await record(projectPath, options);
        return 0;
      }

      case "help":
        context.write(MAIN_HELP);
        return 0;

      default:
        throw new AppError("INVALID_ARGUMENT", `Unknown command: ${command}`);
    }
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}
