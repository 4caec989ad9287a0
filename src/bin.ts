#!/usr/bin/env node
import fs from "node:fs";
import { run } from "./cli";
import { loadConfig } from "./config";

const code = run(
  process.argv.slice(2),
  {
    readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  },
  loadConfig()
);

process.exitCode = code;
