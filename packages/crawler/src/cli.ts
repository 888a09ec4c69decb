#!/usr/bin/env node
import { main } from "./index.js";

main().catch((error: unknown) => {
  console.error("Crawl failed:", error);
  process.exitCode = 1;
});
