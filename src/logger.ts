import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { stripVTControlCharacters, format } from "util";
import chalk from "chalk";

// ============================================
// Logger
// ============================================
// Console output is coloured and filtered by --verbose / --quiet.
// When a log file is configured every line (debug included) is also
// appended there as "<iso time> - LEVEL - message".

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Suppresses console output entirely (tests, --json mode) */
  silent?: boolean;
  logFile?: string;
}

export class Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;
  private readonly silent: boolean;
  private logFile?: string;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
    this.silent = options.silent ?? false;
    if (options.logFile) this.attachFile(options.logFile);
  }

  /** Starts mirroring log lines to a file, creating its directory */
  attachFile(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    this.logFile = path;
  }

  info(...args: unknown[]) {
    this.record("INFO", args);
    if (!this.quiet && !this.silent) console.log(chalk.blue("info"), ...args);
  }

  success(...args: unknown[]) {
    this.record("INFO", args);
    if (!this.quiet && !this.silent) console.log(chalk.green("✓"), ...args);
  }

  warn(...args: unknown[]) {
    this.record("WARNING", args);
    if (!this.silent) console.log(chalk.yellow("warn"), ...args);
  }

  error(...args: unknown[]) {
    this.record("ERROR", args);
    if (!this.silent) console.error(chalk.red("error"), ...args);
  }

  debug(...args: unknown[]) {
    this.record("DEBUG", args);
    if (this.verbose && !this.silent) console.log(chalk.gray("debug"), ...args);
  }

  dim(...args: unknown[]) {
    if (!this.quiet && !this.silent) console.log(chalk.dim(...args.map(String)));
  }

  private record(level: string, args: unknown[]): void {
    if (!this.logFile) return;
    const line = stripVTControlCharacters(format(...args));
    try {
      appendFileSync(this.logFile, `${new Date().toISOString()} - ${level} - ${line}\n`);
    } catch (error) {
      // Stop mirroring after the first failed write
      this.logFile = undefined;
      if (!this.silent) console.error(chalk.red("error"), `Log file disabled: ${error}`);
    }
  }
}

/** Logger that prints nothing; the default for library components */
export const silentLogger = new Logger({ silent: true });
