#!/usr/bin/env node
import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
