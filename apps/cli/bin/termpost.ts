#!/usr/bin/env tsx

import { run } from "../src/index";

process.on("unhandledRejection", (reason) => {
  console.error(
    "Unhandled rejection:",
    reason instanceof Error ? reason.message : reason
  );
  process.exit(1);
});

process.exitCode = await run();
