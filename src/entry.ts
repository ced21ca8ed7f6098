#!/usr/bin/env node
import { runDeviceModule } from "./module/run.js";

process.exitCode = await runDeviceModule({
  argv: process.argv.slice(2),
  stdout: (line) => process.stdout.write(`${line}\n`),
});
