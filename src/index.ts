#!/usr/bin/env node
import { CommandHandler } from "./utils/commandHandler";
import { UserCancelledError } from "./scenes/errors";
import { getLogger } from "./utils/logger";

const log = getLogger("main");

async function main() {
  const commandHandler = CommandHandler.getHandler();
  const args = await commandHandler.parseArgs(process.argv);
  const entry = await commandHandler.getCommandCallback(args);
  await entry();
}

main().catch((error: unknown) => {
  if (error instanceof UserCancelledError) {
    log.warn("Operation interrupted by user.");
    process.exit(130);
  }
  log.error("A fatal error has occurred:", error);
  process.exit(1);
});
