import { DEFAULT_USER_AGENT } from "./core/utils";
import { CheckError } from "./errors";
import type { CheckConfig, LoginTarget } from "./types";

export const USAGE = `Usage: login-redirect-check --login-url <url> --username <name> --password <secret> [options]

Submits the login form found at --login-url and reports whether the redirect
after submission leaves the login page's registrable domain.

Options:
  --login-url <url>          Login page to check (prompted for when missing)
  --username <name>          Username to submit (prompted for when missing)
  --password <secret>        Password to submit (prompted for when missing)
  --username-field <name>    Input name for the username, skips detection
  --password-field <name>    Input name for the password, skips detection
  --extra <key=value>        Extra form field, repeatable; wins over page values
  --insecure                 Do not verify TLS certificates
  --json                     Print the result as JSON
  --timeout <ms>             Per-request timeout (default 15000)
  --max-redirects <n>        Redirects followed per request (default 10)
  --user-agent <ua>          User-Agent header
  --allow-domain <domain>    Trusted domain, repeatable
  --allowlist <file>         CSV/XLSX file of trusted domains
  --column <name>            Allowlist column holding the domains
  --quiet                    No progress logging on stderr
  --help                     Show this help

Exit codes: 0 same domain, 1 different domain, 2 error`;

/** Raw command-line options before prompting and validation */
export interface CliArgs {
  loginUrl?: string;
  username?: string;
  password?: string;
  usernameField?: string;
  passwordField?: string;
  extra: string[];
  insecure: boolean;
  json: boolean;
  quiet: boolean;
  help: boolean;
  timeout?: string;
  maxRedirects?: string;
  userAgent?: string;
  allowDomains: string[];
  allowlist?: string;
  column?: string;
}

const BOOLEAN_FLAGS = new Set(["insecure", "json", "quiet", "help"]);

/**
 * Parse CLI arguments. Options take their value either as --key=value or
 * as the following argument.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    extra: [],
    insecure: false,
    json: false,
    quiet: false,
    help: false,
    allowDomains: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h") {
      args.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw new CheckError("ConfigError", `Unexpected argument "${arg}"`);
    }

    const eqIdx = arg.indexOf("=");
    const key = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);

    if (BOOLEAN_FLAGS.has(key)) {
      if (eqIdx !== -1) {
        throw new CheckError("ConfigError", `Option --${key} takes no value`);
      }
      setFlag(args, key);
      continue;
    }

    let value: string;
    if (eqIdx !== -1) {
      value = arg.slice(eqIdx + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new CheckError("ConfigError", `Option --${key} needs a value`);
      }
      value = next;
      i++;
    }
    setOption(args, key, value);
  }

  return args;
}

function setFlag(args: CliArgs, key: string): void {
  if (key === "insecure") args.insecure = true;
  else if (key === "json") args.json = true;
  else if (key === "quiet") args.quiet = true;
  else args.help = true;
}

function setOption(args: CliArgs, key: string, value: string): void {
  switch (key) {
    case "login-url": args.loginUrl = value; break;
    case "username": args.username = value; break;
    case "password": args.password = value; break;
    case "username-field": args.usernameField = value; break;
    case "password-field": args.passwordField = value; break;
    case "extra": args.extra.push(value); break;
    case "timeout": args.timeout = value; break;
    case "max-redirects": args.maxRedirects = value; break;
    case "user-agent": args.userAgent = value; break;
    case "allow-domain": args.allowDomains.push(value); break;
    case "allowlist": args.allowlist = value; break;
    case "column": args.column = value; break;
    default:
      throw new CheckError("ConfigError", `Unknown option --${key}`);
  }
}

/**
 * Split an --extra value at its first "=". The value may be empty or
 * contain further "=" characters; the key may not be empty.
 */
export function parseExtraField(raw: string): [string, string] {
  const eqIdx = raw.indexOf("=");
  const key = eqIdx === -1 ? "" : raw.slice(0, eqIdx).trim();
  if (!key) {
    throw new CheckError("ConfigError", `--extra expects key=value, got "${raw}"`);
  }
  return [key, raw.slice(eqIdx + 1)];
}

function parseInteger(option: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || parseInt(trimmed, 10) < min) {
    throw new CheckError("ConfigError", `--${option} expects an integer >= ${min}, got "${raw}"`);
  }
  return parseInt(trimmed, 10);
}

/**
 * Validate parsed arguments and apply defaults.
 * Login URL and credentials must be present by now.
 */
export function buildConfig(args: CliArgs): CheckConfig {
  const { loginUrl, username, password } = args;
  if (!loginUrl) throw new CheckError("ConfigError", "Missing --login-url");
  if (username === undefined) throw new CheckError("ConfigError", "Missing --username");
  if (password === undefined) throw new CheckError("ConfigError", "Missing --password");

  let parsedUrl: URL;
  try {
    parsedUrl = new URL(loginUrl);
  } catch {
    throw new CheckError("ConfigError", `--login-url is not a valid URL: "${loginUrl}"`);
  }
  if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
    throw new CheckError("ConfigError", `--login-url must be http or https, got "${parsedUrl.protocol}"`);
  }

  const extraFields: Record<string, string> = {};
  for (const raw of args.extra) {
    const [key, value] = parseExtraField(raw);
    extraFields[key] = value;
  }

  const target: LoginTarget = Object.freeze({
    loginUrl: parsedUrl.href,
    username,
    password,
    usernameField: args.usernameField?.trim() || undefined,
    passwordField: args.passwordField?.trim() || undefined,
    extraFields: Object.freeze(extraFields),
  });

  return {
    target,
    insecure: args.insecure,
    json: args.json,
    quiet: args.quiet,
    timeout: parseInteger("timeout", args.timeout, 15_000, 1),
    maxRedirects: parseInteger("max-redirects", args.maxRedirects, 10, 0),
    userAgent: args.userAgent?.trim() || DEFAULT_USER_AGENT,
    allowDomains: args.allowDomains.map((d) => d.trim()).filter(Boolean),
    allowlistFile: args.allowlist,
    allowlistColumn: args.column,
  };
}
