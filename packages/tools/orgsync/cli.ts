// orgsync CLI entry point

import { randomUUID } from "node:crypto";
import { homedir } from "node:os";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { CommanderError } from "commander";
import { type CliDeps, createProgram } from "./adapters/cli/commands.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { ConsoleLogger } from "./adapters/logging/console-logger.ts";
import { NodeProcessRunner } from "./adapters/process/node-process-runner.ts";
import { JsdiffService } from "./adapters/services/jsdiff-service.ts";
import { Sha256HashService } from "./adapters/services/sha256-hash.ts";

export const VERSION = "0.1.0";

async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf8");
  let data = "";
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

export function defaultDeps(): CliDeps {
  return {
    fs: new NodeFileSystem(),
    processRunner: new NodeProcessRunner(),
    hashService: new Sha256HashService(),
    diffService: new JsdiffService(),
    env: process.env,
    homeDir: homedir(),
    supportFile: fileURLToPath(
      new URL("./emacs/orgsync-ediff.el", import.meta.url),
    ),
    now: () => new Date(),
    generateUuid: () => randomUUID(),
    readStdin,
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    createLogger: (verbose) => new ConsoleLogger(verbose),
  };
}

/** Run the CLI and return its exit code */
export async function main(
  args: string[],
  deps: CliDeps = defaultDeps(),
): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(deps, state).version(VERSION);
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return state.exitCode;
}

// Run if executed directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  process.exitCode = await main(process.argv.slice(2));
}
