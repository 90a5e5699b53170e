/**
 * Node.js example for the bridge client
 *
 * Sends a few newline-terminated lines to a process listening on
 * localhost:3001 and prints whatever it sends back.
 *
 * Run: npx ts-node examples/node/client.ts
 */

import { BridgeClient, withSync, withReadTimeout } from "../../src/index";

async function main() {
  const client = BridgeClient.create({ host: "localhost", port: 3001 }, [
    withSync(true),
    withReadTimeout(2000),
  ]);

  client.onError((err) => {
    console.error("Error:", err.message);
  });

  if (!(await client.start())) {
    process.exitCode = 1;
    return;
  }

  await client.exchange("clear;\n");

  const lines = ["obj 10 10 osc~ 440;", "obj 10 60 dac~;", "connect 0 0 1 0;", "connect 0 0 1 1;"];
  for (const line of lines) {
    const reply = await client.exchange(`${line}\n`);
    console.log(`${line} -> ${reply ?? "(no data)"}`);
  }

  await client.close();
}

main().catch(console.error);
