#!/usr/bin/env node
import readline from "node:readline/promises";

import { optimizeLoadStoreWithReport } from "./load-store.js";
import { parseArgs, USAGE } from "./options.js";
import { blockToString } from "./print.js";
import { parseBlock, serializeBlock } from "./serialize.js";

async function main() {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    console.log(USAGE);
    return;
  }

  const rl = readline.createInterface({
    input: process.stdin,
  });

  let json = "";

  try {
    for await (const line of rl) {
      json += line;
    }
  } finally {
    rl.close();
  }

  let block = parseBlock(JSON.parse(json));

  if (opts.optimize) {
    const { block: optimized, report } = optimizeLoadStoreWithReport(block);

    if (opts.stats) {
      console.error(
        `forwarded loads: ${report.forwardedLoads.length} [${report.forwardedLoads.join(", ")}]`,
      );
      console.error(
        `dead stores: ${report.deadStores.length} [${report.deadStores.join(", ")}]`,
      );
    }

    block = optimized;
  }

  process.stdout.write(
    opts.text
      ? `${blockToString(block)}\n`
      : JSON.stringify(serializeBlock(block)),
  );
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
