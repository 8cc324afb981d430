/**
 * CLI Authentication Commands
 *
 * Stores a bearer token for the sync API. Obtaining the token is done
 * elsewhere (the web dashboard); this only keeps it on disk.
 *
 * Commands:
 *   transcript-sync auth login [token]   Save an access token
 *   transcript-sync auth logout          Remove the stored token
 *   transcript-sync auth status          Show authentication status
 */

import * as readline from "readline";
import { isExpired, TOKEN_ENV_VAR, type StoredCredentials } from "../auth/credentials.js";
import { describeError } from "../sync/errors.js";
import { getCliPaths, getTokenStore, type CliContext } from "./context.js";

export type Prompt = (question: string, hidden?: boolean) => Promise<string>;

/**
 * Prompt user for input (with optional hidden input for sensitive data)
 */
export const prompt: Prompt = (question, hidden = false) => {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    if (hidden && process.stdin.isTTY) {
      // Hide input for sensitive data
      process.stdout.write(question);
      let input = "";
      process.stdin.setRawMode(true);
      process.stdin.resume();

      const onData = (char: Buffer): void => {
        const c = char.toString();
        if (c === "\n" || c === "\r") {
          process.stdin.setRawMode(false);
          process.stdin.removeListener("data", onData);
          process.stdout.write("\n");
          rl.close();
          resolve(input);
        } else if (c === "\u0003") {
          // Ctrl+C
          process.stdin.setRawMode(false);
          process.exit(130);
        } else if (c === "\u007f") {
          // Backspace
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.clearLine(0);
            process.stdout.cursorTo(0);
            process.stdout.write(question + "*".repeat(input.length));
          }
        } else {
          input += c;
          process.stdout.write("*");
        }
      };
      process.stdin.on("data", onData);
    } else {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer);
      });
    }
  });
};

function maskToken(token: string): string {
  return token.length > 8 ? `${token.slice(0, 8)}...` : "********";
}

/**
 * Save an access token. Prompts (hidden) when none is given.
 */
export async function cmdAuthLogin(
  ctx: CliContext,
  tokenArg?: string,
  ask: Prompt = prompt
): Promise<number> {
  const store = getTokenStore(ctx);

  let token = tokenArg?.trim();
  if (!token) {
    let existing: boolean;
    try {
      existing = (await store.load()) !== null;
    } catch (err) {
      // An unreadable file still counts as existing credentials
      console.error(`Warning: ${describeError(err)}`);
      existing = true;
    }
    if (existing) {
      const overwrite = await ask("Overwrite existing credentials? (y/N): ");
      if (overwrite.toLowerCase() !== "y") {
        console.log("Cancelled.");
        return 0;
      }
    }
    token = (await ask("Enter your access token: ", true)).trim();
  }

  if (!token) {
    console.error("\nError: No token provided.");
    return 1;
  }

  await store.save({ accessToken: token });
  console.log(`Token saved to ${getCliPaths(ctx).credentialsFile}`);
  return 0;
}

/**
 * Logout - clear credentials
 */
export async function cmdAuthLogout(ctx: CliContext): Promise<number> {
  const store = getTokenStore(ctx);

  let existing: StoredCredentials | null;
  try {
    existing = await store.load();
  } catch (err) {
    await store.clear();
    console.log(`Removed unreadable credentials (${describeError(err)}).`);
    return 0;
  }

  if (!existing) {
    console.log("Not currently logged in.");
    return 0;
  }

  await store.clear();
  console.log("Logged out successfully.");
  console.log("Sync state is still preserved in ~/.transcript-sync/");
  return 0;
}

/**
 * Show authentication status (without contacting the server)
 */
export async function cmdAuthStatus(ctx: CliContext, now: Date = new Date()): Promise<number> {
  if (ctx.env[TOKEN_ENV_VAR]) {
    console.log(`Status: Using ${TOKEN_ENV_VAR} from environment`);
    return 0;
  }

  let stored: StoredCredentials | null;
  try {
    stored = await getTokenStore(ctx).load();
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }

  if (!stored) {
    console.log("Status: Not logged in");
    console.log("\nRun: transcript-sync auth login");
    return 0;
  }

  if (isExpired(stored, now)) {
    console.log(`Status: Token expired (${stored.expiresAt ?? "unknown"})`);
    console.log("\nRun: transcript-sync auth login");
    return 0;
  }

  console.log("Status: Logged in");
  console.log(`Token: ${maskToken(stored.accessToken)}`);
  if (stored.expiresAt) {
    console.log(`Expires: ${stored.expiresAt}`);
  }
  return 0;
}

export function cmdAuthHelp(): void {
  console.log(`
Authentication Commands:
  transcript-sync auth login              Save an access token (prompted)
  transcript-sync auth login <token>      Save an access token (inline)
  transcript-sync auth logout             Remove the stored token
  transcript-sync auth status             Show stored credentials

Environment Variables:
  ${TOKEN_ENV_VAR}          Use this token instead of the stored one
`);
}
