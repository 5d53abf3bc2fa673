#!/usr/bin/env node
import { runCli } from "./cli/commands.js";

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("interrupted, cancelling running targets");
    controller.abort();
  });
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    signal: controller.signal
  });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 2;
});
