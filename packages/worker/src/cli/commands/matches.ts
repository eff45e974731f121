import minimist from "minimist";
import { getConfig } from "@chanwatch/core";
import { DEFAULT_LIST_LIMIT, openMatchStore } from "../../storage/sqlite";
import { intArg, stringArg } from "../utils/args";

export async function matchesCommand() {
  const argv = minimist(process.argv.slice(3), { string: ["limit", "product"] });
  const limit = intArg(argv.limit, DEFAULT_LIST_LIMIT);
  const productName = stringArg(argv.product);
  const filter = productName ? { productName } : {};

  const store = await openMatchStore(getConfig().sqlitePath);
  try {
    const total = store.countMatches(filter);
    const matches = store.listMatches(limit, filter);
    console.log(JSON.stringify({ total, matches }, null, 2));
  } finally {
    store.close();
  }
}
