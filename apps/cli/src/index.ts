#!/usr/bin/env tsx
import { runCli } from "./cli.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error("portbridge failed:", err);
  process.exit(1);
});
