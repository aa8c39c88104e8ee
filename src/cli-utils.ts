import * as fs from "node:fs";

/** Grace period (ms) for open connections to drain before force-exiting. */
export const EXIT_TIMEOUT_MS = 2000;

/** Parsed command line. */
export interface CliOptions {
  help: boolean;
  version: boolean;
  configPath?: string;
  host?: string;
  port?: number;
  /** `--header Name=value` entries, in order. */
  headers: Record<string, string>;
}

/** Take the value following a flag, rejecting a missing value or another flag. */
function flagValue(args: string[], index: number, flag: string, what: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`${flag} requires ${what}.`);
  }
  return value;
}

/** Parse a `Name=value` header argument. */
export function parseHeaderArg(arg: string): [string, string] {
  const eq = arg.indexOf("=");
  const name = eq === -1 ? "" : arg.slice(0, eq).trim();
  if (!name) {
    throw new Error(`Invalid header "${arg}". Expected Name=value.`);
  }
  return [name, arg.slice(eq + 1).trim()];
}

/**
 * Parse CLI arguments (without the node and script paths). Throws with a
 * user-facing message on unknown flags or invalid values.
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false, version: false, headers: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-v":
      case "--version":
        options.version = true;
        break;
      case "-c":
      case "--config":
        options.configPath = flagValue(args, i++, arg, "a file path");
        break;
      case "-H":
      case "--host":
        options.host = flagValue(args, i++, arg, "a host name");
        break;
      case "-p":
      case "--port": {
        const raw = flagValue(args, i++, arg, "a port number");
        const port = Number(raw);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new Error(`Invalid port "${raw}". Must be 0-65535.`);
        }
        options.port = port;
        break;
      }
      case "--header": {
        const [name, value] = parseHeaderArg(flagValue(args, i++, arg, "Name=value"));
        options.headers[name] = value;
        break;
      }
      default:
        throw new Error(`Unknown argument "${arg}". Run devroute --help for usage.`);
    }
  }

  return options;
}

/** Version from the package manifest next to src/ (or dist/). */
export function readVersion(): string {
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}
