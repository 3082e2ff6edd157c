import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerInspect } from "./app/Inspect";
import { registerReconcile } from "./app/Reconcile";
import { registerStatus } from "./app/Status";

const logger = createDefaultLoggerFromEnv();
const cli = cac("takeout-arranger");

registerReconcile(cli, logger);
registerInspect(cli, logger);
registerStatus(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger.dispose();
}
