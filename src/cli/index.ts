#!/usr/bin/env node

/**
 * totpgate CLI — TOTP second factor for login hooks and operators.
 *
 * Usage:
 *   totpgate setup [principal]    Enroll a principal
 *   totpgate auth <principal>     Verify a code (exit 0 on success)
 *   totpgate status <principal>   Show enrollment state
 *   totpgate remove <principal>   Delete a secret
 *   totpgate version              Show version
 *   totpgate help                 Show help
 */

import { ErrorCode, UnrecoverableError, exitCode } from "../core/errors/app-error.js";
import { loadConfig } from "../infrastructure/config/config.js";
import {
  type TerminalConversation,
  createTerminalConversation,
} from "../infrastructure/conversation/terminal-conversation.js";
import { type AppContext, createApp } from "../main.js";
import { authCommand } from "./commands/auth.js";
import { helpCommand } from "./commands/help.js";
import { removeCommand } from "./commands/remove.js";
import { setupCommand } from "./commands/setup.js";
import { statusCommand } from "./commands/status.js";
import { blank, bold, cyan, dim, error, log, white } from "./ui.js";

// ── Version ─────────────────────────────────────────────────────────────

const VERSION = "1.0.0";

// ── Arg parsing ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0]?.toLowerCase() ?? "";
const commandArgs = args.slice(1);

// ── Route command ───────────────────────────────────────────────────────

type AppCommand = (app: AppContext, conversation: TerminalConversation) => Promise<number>;

const withApp = async (commandFn: AppCommand): Promise<number> => {
  const app = createApp(loadConfig());
  if (!app.ok) {
    error(app.error.message);
    return exitCode(app.error.code);
  }

  const conversation = createTerminalConversation();
  try {
    return await commandFn(app.value, conversation);
  } catch (e) {
    if (e instanceof UnrecoverableError) {
      app.value.logger.fatal(e.message, { errorCode: e.error.code });
      return exitCode(e.error.code);
    }
    throw e;
  } finally {
    conversation.close();
  }
};

const run = async (): Promise<number> => {
  switch (command) {
    case "setup":
      return withApp((app, conversation) => setupCommand(commandArgs, app, conversation));
    case "auth":
      return withApp((app, conversation) => authCommand(commandArgs, app, conversation));
    case "status":
      return withApp((app) => statusCommand(commandArgs, app));
    case "remove":
      return withApp((app) => removeCommand(commandArgs, app));

    case "version":
    case "-v":
    case "--version":
      log(`totpgate v${VERSION}`);
      return 0;

    case "help":
    case "-h":
    case "--help":
    case "":
      helpCommand(VERSION);
      return 0;

    default:
      blank();
      error(`Unknown command: ${bold(white(command))}`);
      blank();
      log(`  ${dim("Run")} ${cyan("totpgate help")} ${dim("to see available commands.")}`);
      blank();
      return 1;
  }
};

run().then(
  (status) => {
    process.exitCode = status;
  },
  (e: unknown) => {
    blank();
    error(e instanceof Error ? e.message : String(e));
    blank();
    process.exitCode = exitCode(ErrorCode.INTERNAL);
  },
);
