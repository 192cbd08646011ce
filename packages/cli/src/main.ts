#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv.slice(2));
