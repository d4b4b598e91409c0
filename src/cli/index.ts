#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { DaemonClient } from "../client/client.js";
import { runChangeCommand } from "./change-command.js";
import { parseFormat, runModelCommand } from "./model-command.js";
import { parseTimeout, runRemodelCommand } from "./remodel-command.js";
import { resolveClientOptions } from "./runtime-config.js";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("devmgr")
  .version(toolVersion)
  .option("--socket <path>", "Daemon socket path")
  .option("--url <url>", "Daemon base URL (instead of the socket)")
  .option("--verbose", "Trace requests on stderr");

program
  .command("model")
  .description("Show the device model, or its serial with --serial")
  .option("--serial", "Use the serial assertion")
  .option("--assertion", "Print the raw assertion")
  .option("--format <format>", "Output format (text|json|yaml)", "text")
  .action(async (options) => {
    try {
      const output = await runModelCommand(createClient(), {
        serial: Boolean(options.serial),
        assertion: Boolean(options.assertion),
        format: parseFormat(options.format),
      });
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("remodel")
  .description("Move the device to the model in <file>")
  .argument("<file>", "New model assertion")
  .option("--no-wait", "Print the change id and return")
  .option("--timeout <ms>", "Give up waiting after this many milliseconds")
  .action(async (file: string, options) => {
    try {
      const result = await runRemodelCommand(createClient(), {
        file,
        wait: options.wait,
        timeout:
          options.timeout === undefined
            ? undefined
            : parseTimeout(options.timeout),
      });
      const status = result.change ? ` ${result.change.status}` : "";
      await writeStdout(`${result.changeId}${status}\n`);
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("change")
  .description("Show the status of a change")
  .argument("<id>", "Change id")
  .action(async (id: string) => {
    try {
      const output = await runChangeCommand(createClient(), id);
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

function createClient(): DaemonClient {
  const globals = program.opts<{
    socket?: string;
    url?: string;
    verbose?: boolean;
  }>();
  return new DaemonClient(
    resolveClientOptions(globals, process.env, (message) => {
      process.stderr.write(`> ${message}\n`);
    }),
  );
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
