import minimist from "minimist";
import { createLogger, getConfig, loadWatchConfig } from "@chanwatch/core";
import { buildMatcher } from "../../runtime";
import { stringArg } from "../utils/args";
import { readStdin } from "../utils/readStdin";

export async function matchCommand() {
  const argv = minimist(process.argv.slice(3), { string: ["text"] });
  let text = stringArg(argv.text) ?? "";
  if (!text && process.stdin.isTTY !== true) {
    text = await readStdin();
  }
  text = text.trim();

  if (!text) {
    console.error("Usage: match --text '<message>'  or:  echo '<message>' | match");
    process.exit(1);
  }

  const config = getConfig();
  const logger = createLogger(config.log.level);
  const watchConfig = await loadWatchConfig(config.watchConfigPath);
  const matcher = buildMatcher(watchConfig, logger);

  const matches = matcher.matchMessage(text);
  console.log(JSON.stringify({ matches }, null, 2));
}
