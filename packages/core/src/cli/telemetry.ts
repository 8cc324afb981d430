/**
 * CLI Telemetry Commands
 *
 *   transcript-sync telemetry on|off|status
 */

import type { TelemetryClient } from "@transcript-sync/telemetry";
import { describeError } from "../sync/errors.js";

export async function cmdTelemetry(telemetry: TelemetryClient, subcommand?: string): Promise<number> {
  try {
    switch (subcommand) {
      case "on":
        telemetry.enable();
        console.log("Telemetry enabled.");
        return 0;
      case "off":
        await telemetry.disable();
        console.log("Telemetry disabled. No usage data will be sent.");
        return 0;
      case "status":
      case undefined:
        console.log(`Telemetry: ${telemetry.isEnabled() ? "enabled" : "disabled"}`);
        console.log(`Anonymous ID: ${telemetry.getUserId()}`);
        return 0;
      default:
        console.error(`Unknown telemetry command: ${subcommand}`);
        console.error("Usage: transcript-sync telemetry on|off|status");
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}
