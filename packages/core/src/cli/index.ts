#!/usr/bin/env node
/**
 * transcript-sync CLI
 *
 * Usage:
 *   transcript-sync sync                 Upload new conversation messages
 *   transcript-sync status               Show configuration and sync state
 *   transcript-sync auth login [token]   Save an access token
 *   transcript-sync config show          Print the effective configuration
 *   transcript-sync telemetry off        Opt out of usage statistics
 */

import { config as loadDotenv } from "dotenv";
import { homedir, hostname } from "os";
import { main } from "./main.js";

// Load .env from the working directory before reading process.env
loadDotenv({ quiet: true });

main(process.argv.slice(2), {
  homeDir: homedir(),
  hostname: hostname(),
  env: process.env,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
