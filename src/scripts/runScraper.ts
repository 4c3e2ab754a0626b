#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli";

runCli(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Unexpected failure", err);
    process.exitCode = 1;
  }
);
