#!/usr/bin/env node
import { buildConfig, parseArgs, USAGE } from "./cli-args";
import type { CliArgs } from "./cli-args";
import { CheckError } from "./errors";
import { errorReport, runCheck } from "./pipeline";
import { canPrompt, prompt } from "./prompt";
import { exitCodeFor, renderJson, renderText } from "./reporter";
import type { CheckConfig, CheckReport } from "./types";

/**
 * Ask for the login URL and credentials that were not given on the
 * command line, when a terminal is attached.
 */
async function fillMissing(args: CliArgs): Promise<CliArgs> {
  const missing = !args.loginUrl || args.username === undefined || args.password === undefined;
  if (!missing) return args;
  if (!canPrompt()) {
    throw new CheckError(
      "ConfigError",
      "Missing --login-url, --username or --password and no terminal to prompt on"
    );
  }

  return {
    ...args,
    loginUrl: args.loginUrl || (await prompt("Login page URL: ")),
    username: args.username ?? (await prompt("Username: ")),
    password: args.password ?? (await prompt("Password: ", true)),
  };
}

function emit(report: CheckReport, json: boolean): void {
  console.log(json ? renderJson(report) : renderText(report));
  process.exitCode = exitCodeFor(report.verdict);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  let config: CheckConfig;
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return;
    }
    config = buildConfig(await fillMissing(args));
  } catch (err: unknown) {
    emit(errorReport(err), argv.includes("--json"));
    if (!argv.includes("--json")) console.error(`\n${USAGE}`);
    return;
  }

  const report = await runCheck(config);
  emit(report, config.json);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`Fatal: ${msg}`);
  process.exitCode = 2;
});
