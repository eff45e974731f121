import { matchCommand } from "./commands/match";
import { scanCommand } from "./commands/scan";
import { watchCommand } from "./commands/watch";
import { matchesCommand } from "./commands/matches";
import { checkConfigCommand } from "./commands/checkConfig";

export async function runCli() {
  const command = process.argv[2];

  const runners: Record<string, () => Promise<void>> = {
    match: matchCommand,
    scan: scanCommand,
    watch: watchCommand,
    matches: matchesCommand,
    "check-config": checkConfigCommand,
  };

  const runner = runners[command || ""];
  if (!runner) {
    console.error(`Unknown command: ${command || "(none)"}`);
    console.error("Available commands:");
    Object.keys(runners).forEach((c) => console.error(`  ${c}`));
    process.exit(1);
  }

  try {
    await runner();
  } catch (error) {
    console.error("Fatal error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  void runCli();
}
