#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { main } from "./main.js";
import { runPreflightChecks } from "./preflight.js";

const HELP_TEXT = `relaybot - Telegram relay for OpenAI-compatible chat completions

Usage:
  relaybot [options]
  relaybot preflight [--config-dir <path>]

Options:
  -h, --help      Show help
  -v, --version   Show version
`;

const isDirectExecution = () => {
  if (!process.argv[1]) {
    return false;
  }
  try {
    return path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

const readVersion = () => {
  try {
    const packagePath = path.resolve(
      path.dirname(fileURLToPath(import.meta.url)),
      "..",
      "package.json"
    );
    const raw = fs.readFileSync(packagePath, "utf-8");
    const parsed = JSON.parse(raw) as { version?: string };
    return parsed.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
};

const parsePreflightArgs = (args: string[]) => {
  const options: { cwd?: string } = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--config-dir") {
      const value = args[i + 1];
      if (!value) {
        throw new Error("Missing value for --config-dir.");
      }
      options.cwd = path.resolve(value);
      i += 1;
      continue;
    }
    throw new Error(`Unknown preflight option: ${arg}`);
  }
  return options;
};

export const runCli = async (
  args: string[] = process.argv.slice(2),
  out: NodeJS.WritableStream = process.stdout
) => {
  if (args[0] === "preflight") {
    const report = runPreflightChecks(parsePreflightArgs(args.slice(1)));
    out.write("preflight: ok\n");
    out.write(`provider.model: ${report.model}\n`);
    out.write(`provider.baseUrl: ${report.baseUrl}\n`);
    out.write(`history.limit: ${report.historySizeLimit}\n`);
    out.write(`retry.maxAttempts: ${report.maxAttempts}\n`);
    out.write(`telegram.chunkSizeLimit: ${report.chunkSizeLimit}\n`);
    out.write(`telegram.allowedUsers: ${report.allowedUserCount}\n`);
    for (const warning of report.warnings) {
      out.write(`warning: ${warning}\n`);
    }
    return;
  }
  if (args.includes("--help") || args.includes("-h")) {
    out.write(`${HELP_TEXT}\n`);
    return;
  }
  if (args.includes("--version") || args.includes("-v")) {
    out.write(`${readVersion()}\n`);
    return;
  }
  await main();
};

if (isDirectExecution()) {
  void runCli().catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`relaybot command failed: ${message}\n`);
    process.exit(1);
  });
}
