#!/usr/bin/env node
/**
 * metadata-export CLI entry point.
 */

import { Command } from "commander";
import { ConfigurationError, MetadataExportError } from "../errors.js";
import { registerCleanupCommands } from "./commands/cleanup.js";
import { registerExportCommands } from "./commands/export.js";

const program = new Command();

program
  .name("metadata-export")
  .description("Export catalogue metadata records to ISO 19139 XML")
  .version("0.1.0");

registerExportCommands(program);
registerCleanupCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigurationError || err instanceof MetadataExportError) {
    console.error(`❌ ${err.message}`);
  } else {
    console.error("❌ Unexpected failure:", err);
  }
  process.exitCode = 1;
});
