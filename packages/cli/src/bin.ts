#!/usr/bin/env node

import { run } from "./cli.js";

void run().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
