export interface CliOptions {
  readonly help: boolean;
  /** Explicit config file; skips discovery. */
  readonly config: string | null;
  /** tsconfig.json; wins over the config file's `project`. */
  readonly project: string | null;
  readonly outDir: string | null;
  /** Compare instead of writing; out-of-date output fails the run. */
  readonly check: boolean;
  readonly verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: readonly string[]): CliOptions {
  let help = false;
  let config: string | null = null;
  let project: string | null = null;
  let outDir: string | null = null;
  let check = false;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--config":
      case "-c":
        config = valueOf(args, ++i, arg);
        break;
      case "--project":
      case "-p":
        project = valueOf(args, ++i, arg);
        break;
      case "--out-dir":
      case "-o":
        outDir = valueOf(args, ++i, arg);
        break;
      case "--check":
        check = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      default:
        throw new UsageError(`Unknown option '${arg}'`);
    }
  }

  return { help, config, project, outDir, check, verbose };
}

function valueOf(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`Option '${flag}' needs a value`);
  }
  return value;
}

export function usage(): string {
  return [
    "wirekit - generate constructors and service registrations",
    "",
    "Usage:",
    "  wirekit [options]",
    "",
    "Options:",
    "  -c, --config <file>     Config file (default: nearest wirekit.config.*)",
    "  -p, --project <file>    tsconfig.json of the project (default: ./tsconfig.json)",
    "  -o, --out-dir <dir>     Output directory, relative to the project (default: .wirekit)",
    "      --check             Fail when the output on disk is out of date; write nothing",
    "  -v, --verbose           Print progress",
    "  -h, --help              Show this message",
    "",
    "Exit codes: 0 success, 1 error diagnostics or stale output, 2 usage or config error",
    "",
  ].join("\n");
}
