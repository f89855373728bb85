#!/usr/bin/env tsx
import { handleCLI } from "./src/cli";

handleCLI().catch((error: unknown) => {
  console.error("❌ Failed to start file-serve:", error);
  process.exit(1);
});
