#!/usr/bin/env tsx
import process from "node:process";
import { runCli } from "../src/cli";

process.exitCode = runCli(process.argv.slice(2));
