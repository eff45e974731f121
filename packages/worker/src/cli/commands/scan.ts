import minimist from "minimist";
import { loadMessageFile } from "../../messages/messageFile";
import { scanHistory } from "../../monitor/scanHistory";
import { createRuntime } from "../../runtime";
import { intArg, stringArg } from "../utils/args";

export const DEFAULT_SCAN_LIMIT = 100;

export async function scanCommand() {
  const argv = minimist(process.argv.slice(3), { string: ["file", "limit"] });
  const file = stringArg(argv.file) ?? stringArg(argv.f);
  const limit = intArg(argv.limit, DEFAULT_SCAN_LIMIT);

  if (!file) {
    console.error("Usage: scan --file <export.json|export.jsonl> [--limit 100]");
    process.exit(1);
  }

  const messages = await loadMessageFile(file);
  const runtime = await createRuntime();
  try {
    runtime.logger.info({ file, messages: messages.length }, "Loaded message export");
    const result = await scanHistory(messages, {
      processor: runtime.processor,
      channels: runtime.watchConfig.channels,
      limit,
      logger: runtime.logger,
    });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    runtime.close();
  }
}
