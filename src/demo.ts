import { DEMOS } from "./demos.js";
import { optimizeLoadStore } from "./load-store.js";
import { blockToString } from "./print.js";

const RULE = "=".repeat(70);

DEMOS.forEach((demo, i) => {
  const block = demo.build();

  console.log(RULE);
  console.log(`DEMO ${i + 1}: ${demo.title}`);
  console.log(RULE);
  console.log(`\nScenario: ${demo.scenario}\n`);
  console.log("Before optimization:");
  console.log(blockToString(block));
  console.log("\nAfter optimization:");
  console.log(blockToString(optimizeLoadStore(block)));
  console.log();
});
