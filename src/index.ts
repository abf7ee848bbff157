#!/usr/bin/env node
/**
 * contact-ledger - Zoho Mail sender directory
 *
 * Walks the inbox of a Zoho Mail account through the REST API and builds a
 * deduplicated list of everyone who has written to it:
 * - OAuth2 authorization-code flow with a cached, auto-refreshed token
 * - Rate limiting and retries tuned to Zoho's per-minute quota
 * - Optional attachment download, filtered by FILE_TYPES
 * - JSON and CSV export with backups of the previous run
 * - Graceful Ctrl+C handling (exports what was collected so far)
 *
 * Setup:
 *   1. Register a server-based client at https://api-console.zoho.in
 *   2. Set its redirect URI to "http://localhost:5000/oauth/callback"
 *   3. Create .env with ZOHO_CLIENT_ID and ZOHO_CLIENT_SECRET
 *   4. Optionally configure in .env:
 *      - ZOHO_ACCOUNTS_URL / ZOHO_API_BASE: data centre (.com, .eu, .in, ...)
 *      - OUTPUT_DIR: Output directory path
 *      - FILE_TYPES: Comma-separated extensions (e.g., "pdf,docx") or "*" for all
 *
 * Usage:
 *   contact-ledger                      # Extract with defaults
 *   contact-ledger --no-attachments     # Contacts only
 *   contact-ledger --format csv         # CSV export only
 *   contact-ledger --logout             # Forget the cached token
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";
import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import ora from "ora";
import cliProgress from "cli-progress";
import { AUTH_TIMEOUT_MS, loadConfig, type ConfigOverrides, type ExtractorConfig } from "./config.js";
import { ConfigError, ExitCode, errorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { FileTokenStore } from "./token-store.js";
import { TokenManager } from "./token-manager.js";
import { ensureAuthenticated, type AuthOutcome } from "./auth-flow.js";
import { RateLimiter } from "./rate-limiter.js";
import { RequestExecutor } from "./request-executor.js";
import { MailApi } from "./mail-api.js";
import { ContactExtractor, type ExtractionResult, type PageProgress } from "./extractor.js";
import { exportContacts, type ExportedFile } from "./export.js";
import {
  attachmentBytes,
  buildRunSummary,
  exitCodeFor,
  formatDuration,
  formatSize,
  topAttachmentSenders,
  topSenders,
} from "./summary.js";

// ============================================
// Constants
// ============================================
const VERSION = readVersion();
const LOG_FILE = "extractor.log";

interface CLIOptions {
  output?: string;
  maxMessages?: number;
  pageSize?: number;
  attachments: boolean;
  format?: string;
  reauth: boolean;
  logout: boolean;
  json: boolean;
  verbose: boolean;
  quiet: boolean;
}

// package.json sits one level above both src/ and dist/
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function showBanner(): void {
  const orange = chalk.hex("#fb923c");
  const amber = chalk.hex("#fbbf24");
  const cyan = chalk.hex("#22d3ee");
  const gray = chalk.hex("#94a3b8");
  const dim = chalk.hex("#64748b");

  const title = orange.bold("contact") + amber.bold("-ledger");

  const banner = `
  ${dim("    ╭────────────────────────────────────────╮")}
  ${dim("    │")}                                        ${dim("│")}
  ${dim("    │")}    ${cyan("✦")} ${title}  ${dim(("v" + VERSION).padEnd(16))}  ${dim("│")}
  ${dim("    │")}                                        ${dim("│")}
  ${dim("    │")}    ${gray("Everyone who ever wrote to you,")}     ${dim("│")}
  ${dim("    │")}    ${gray("straight from your Zoho inbox.")}      ${dim("│")}
  ${dim("    │")}                                        ${dim("│")}
  ${dim("    ╰────────────────────────────────────────╯")}
`;
  console.log(banner);
}

function showConfigHelp(error: ConfigError): void {
  console.error(chalk.red(`\nError: ${error.message}\n`));
  console.log("Create a .env file with:");
  console.log(chalk.cyan("  ZOHO_CLIENT_ID=your-client-id"));
  console.log(chalk.cyan("  ZOHO_CLIENT_SECRET=your-client-secret"));
  console.log();
  console.log("See: https://api-console.zoho.in -> Server-based Applications");
}

// ============================================
// Main Logic
// ============================================
// 1. Load config from .env + flags
// 2. Authenticate (cached token, refresh, or browser consent)
// 3. Page through the inbox, merging senders into the ledger
// 4. Export JSON/CSV (also after Ctrl+C or a fatal API error)
// 5. Display summary

async function run(options: CLIOptions, logger: Logger): Promise<ExitCode> {
  const startTime = Date.now();
  const overrides: ConfigOverrides = {
    outputDir: options.output,
    pageSize: options.pageSize,
    maxMessages: options.maxMessages,
    attachments: options.attachments,
    formats: options.format,
  };
  const config = loadConfig(process.env, overrides);
  logger.attachFile(join(config.outputDir, LOG_FILE));

  const store = new FileTokenStore(config.tokenPath, logger);
  const tokens = new TokenManager({ oauth: config.oauth, store, logger, timeoutMs: config.requests.timeoutMs });

  if (options.logout) {
    await store.clear();
    if (options.json) {
      console.log(JSON.stringify({ loggedOut: true, tokenPath: config.tokenPath }, null, 2));
    } else {
      console.log(chalk.green(`✓ Cleared cached token (${config.tokenPath})`));
    }
    return ExitCode.Success;
  }

  if (!options.json) {
    logger.dim(`Output:      ${config.outputDir}`);
    logger.dim(`Max emails:  ${config.pagination.maxMessages} (pages of ${config.pagination.pageSize})`);
    logger.dim(
      `Attachments: ${config.attachments.enabled ? config.attachments.allowedExtensions?.join(",") ?? "all (*)" : "off"}`
    );
    logger.dim(`Formats:     ${config.exportFormats.join(", ")}`);
    console.log();
  }

  await authenticate(tokens, config, options, logger);

  const limiter = new RateLimiter({ ...config.rateLimit, logger });
  const executor = new RequestExecutor({
    apiBase: config.apiBase,
    authScheme: config.authScheme,
    tokens,
    limiter,
    maxRetries: config.requests.maxRetries,
    timeoutMs: config.requests.timeoutMs,
    logger,
  });
  const api = new MailApi(executor, logger);

  const useProgressBar = !options.json && !options.quiet && !options.verbose && process.stdout.isTTY === true;
  const progressBar = new cliProgress.SingleBar(
    {
      format: `${chalk.cyan("{bar}")} {percentage}% | {value}/{total} emails | {contacts} contacts | ETA: {eta_formatted}`,
      hideCursor: true,
      barsize: 20,
      etaBuffer: 10,
    },
    cliProgress.Presets.shades_classic
  );
  let barStarted = false;

  const onPage = (progress: PageProgress) => {
    if (!useProgressBar) {
      logger.info(`Progress: ${progress.processed} messages processed, ${progress.uniqueContacts} unique emails found`);
      return;
    }
    const total = Math.min(progress.total ?? progress.maxMessages, progress.maxMessages);
    if (!barStarted) {
      progressBar.start(Math.max(total, progress.processed), 0, { contacts: 0 });
      barStarted = true;
    }
    progressBar.setTotal(Math.max(total, progress.processed));
    progressBar.update(progress.processed, { contacts: progress.uniqueContacts });
  };

  // Ctrl+C: stop after the current page, then export what we have.
  // A second Ctrl+C exits immediately.
  const controller = new AbortController();
  const interrupt = () => {
    if (controller.signal.aborted) {
      process.exit(ExitCode.Success);
    }
    controller.abort();
    if (barStarted) progressBar.stop();
    console.log(chalk.yellow("\nInterrupted! Finishing the current page and saving results..."));
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  const extractor = new ContactExtractor({ config, api, logger, onPage });
  let result: ExtractionResult;
  try {
    result = await extractor.run({ signal: controller.signal });
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
    if (barStarted) progressBar.stop();
  }

  const files = await exportContacts(result.contacts, {
    outputDir: config.outputDir,
    formats: config.exportFormats,
    logger,
  });

  const duration = Date.now() - startTime;
  if (options.json) {
    console.log(JSON.stringify(buildRunSummary(result, files, duration), null, 2));
  } else {
    showSummary(result, files, duration);
  }

  if (result.error !== undefined) {
    logger.error(errorMessage(result.error));
    return exitCodeFor(result.error);
  }
  return ExitCode.Success;
}

async function authenticate(
  tokens: TokenManager,
  config: ExtractorConfig,
  options: CLIOptions,
  logger: Logger
): Promise<AuthOutcome> {
  const spinner = options.json ? null : ora("Authenticating with Zoho...").start();

  try {
    const outcome = await ensureAuthenticated(tokens, {
      redirectUri: config.oauth.redirectUri,
      timeoutMs: AUTH_TIMEOUT_MS,
      forceReauth: options.reauth,
      logger,
      onAuthorize: () => {
        if (spinner) spinner.text = "Waiting for browser authorization...";
      },
      onManualUrl: (url) => {
        spinner?.warn("Could not open browser automatically");
        console.log(chalk.dim("\nOpen this URL in your browser:\n"));
        console.log(chalk.cyan(url));
        console.log();
        spinner?.start("Waiting for browser authorization...");
      },
    });

    const label: Record<AuthOutcome, string> = {
      cached: "Authenticated (cached token)",
      refreshed: "Authenticated (token refreshed)",
      authorized: "Authenticated (new authorization saved)",
    };
    spinner?.succeed(label[outcome]);
    return outcome;
  } catch (error) {
    spinner?.fail("Authentication failed");
    throw error;
  }
}

function showSummary(result: ExtractionResult, files: ExportedFile[], duration: number): void {
  const { contacts } = result;

  console.log();
  console.log(chalk.bold("Summary"));
  console.log(chalk.dim("─".repeat(40)));
  console.log(`  Messages processed: ${chalk.cyan(result.processed)}`);
  console.log(`  Unique contacts:    ${chalk.green(contacts.length)}`);
  if (result.stats.discarded > 0) {
    console.log(`  Discarded:          ${chalk.dim(result.stats.discarded)} ${chalk.dim("(no valid sender)")}`);
  }
  if (result.attachments) {
    const stored = result.attachments.downloaded + result.attachments.reused;
    console.log(`  Attachments:        ${chalk.cyan(stored)} ${chalk.dim(`(${formatSize(attachmentBytes(contacts))})`)}`);
  }
  console.log(`  Duration:           ${chalk.cyan(formatDuration(duration))}`);
  if (result.interrupted) {
    console.log(`  ${chalk.yellow("Interrupted - results are partial")}`);
  }

  const top = topSenders(contacts);
  if (top.length > 0) {
    console.log();
    console.log(chalk.bold(`Top ${top.length} senders`));
    top.forEach((c, i) => {
      console.log(`  ${String(i + 1).padStart(2)}. ${c.name} ${chalk.dim(`<${c.email}>`)} ${chalk.cyan(c.messageCount)}`);
    });
  }

  const withFiles = topAttachmentSenders(contacts);
  if (withFiles.length > 0) {
    console.log();
    console.log(chalk.bold("Top senders by attachments"));
    for (const c of withFiles) {
      const size = c.attachments.reduce((sum, a) => sum + a.size, 0);
      console.log(`  ${c.name} ${chalk.dim(`<${c.email}>`)} ${chalk.cyan(c.attachments.length)} ${chalk.dim(`(${formatSize(size)})`)}`);
    }
  }

  if (files.length > 0) {
    console.log();
    for (const file of files) {
      console.log(`  ${chalk.dim("Saved to:")} ${file.path}`);
    }
  }
  console.log();
}

// ============================================
// CLI Setup
// ============================================
const program = new Command();

program
  .name("contact-ledger")
  .description("Build a deduplicated sender directory from a Zoho Mail inbox")
  .version(VERSION)
  .option("-o, --output <dir>", "output directory")
  .option("--max-messages <n>", "stop after this many messages", parsePositiveInt)
  .option("--page-size <n>", "messages per API page", parsePositiveInt)
  .option("--no-attachments", "skip attachment downloads")
  .option("--format <list>", "export formats (json,csv)")
  .option("--logout", "clear cached authentication token", false)
  .option("--reauth", "force re-authentication (ignore cached token)", false)
  .option("--json", "output the run summary as JSON", false)
  .option("-v, --verbose", "show detailed logs", false)
  .option("-q, --quiet", "minimal output", false)
  .addHelpText('after', `
Examples:
  $ contact-ledger                          # Extract with defaults
  $ contact-ledger --max-messages 500       # First 500 messages only
  $ contact-ledger --no-attachments         # Contacts only
  $ contact-ledger --format csv -o ./out    # CSV into ./out
  $ contact-ledger --reauth                 # Authorize again in the browser
  $ contact-ledger --logout                 # Clear cached token
`)
  .action(async (options: CLIOptions) => {
    const logger = new Logger({ verbose: options.verbose, quiet: options.quiet, silent: options.json });

    if (!options.quiet && !options.json) {
      showBanner();
    }

    try {
      process.exit(await run(options, logger));
    } catch (error) {
      if (error instanceof ConfigError) {
        showConfigHelp(error);
        process.exit(ExitCode.ConfigError);
      }

      const code = exitCodeFor(error);
      const label =
        code === ExitCode.AuthError
          ? "Authentication error"
          : code === ExitCode.FileSystemError
            ? "File system error"
            : "Error";
      console.error(chalk.red(`\n${label}: ${errorMessage(error)}`));
      if (options.verbose && error instanceof Error) {
        console.error(error.stack);
      }
      process.exit(code);
    }
  });

await program.parseAsync();
