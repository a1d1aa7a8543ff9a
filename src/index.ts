#!/usr/bin/env node
import { runCli } from "./cli";

async function main(): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    controller.abort(new Error("received SIGINT"));
  };
  process.once("SIGINT", onSigint);

  try {
    process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fatal: ${message}`);
  process.exitCode = 1;
});
