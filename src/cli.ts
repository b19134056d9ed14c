#!/usr/bin/env node
import { runServer } from "./server.js";

runServer().catch((error: unknown) => {
  console.error("[commit-context] fatal:", error);
  process.exit(1);
});
