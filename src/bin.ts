#!/usr/bin/env node
/**
 * peerchat CLI entry point
 */

import { handleChatCommand } from "./cli-commands.js";
import { logger } from "./logger.js";

handleChatCommand(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(`[bin] Unexpected failure: ${err}`);
    process.exitCode = 1;
  }
);
