#!/usr/bin/env node

import chalk from "chalk";
import { ConfigError, DEFAULT_PORT, describeConfig, loadDevConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { createDevServer } from "./server.js";
import { EXIT_TIMEOUT_MS, parseArgs, readVersion } from "./cli-utils.js";
import type { CliOptions } from "./cli-utils.js";
import { formatUrl } from "./utils.js";

function printHelp(): void {
  console.log(`
${chalk.bold("devroute")} - Development server that forwards matching requests to backends.

${chalk.bold("Usage:")}
  ${chalk.cyan("devroute")}                         Start with ./devroute.json
  ${chalk.cyan("devroute -c dev/devroute.json")}    Start with another config file
  ${chalk.cyan("devroute -p 3000")}                 Override the port

${chalk.bold("Config file (devroute.json):")}
  {
    "server": {
      "port": 8080,
      "headers": { "X-Frame-Options": "DENY" },
      "proxy": {
        "/api/": { "target": "http://localhost:5000", "rewrite": true },
        "^/users/(\\\\d+)/": {
          "target": "http://localhost:5001",
          "rewrite": "^/users/(\\\\d+)/->/u/$1/"
        }
      }
    }
  }

${chalk.bold("Proxy rules:")}
  Keys must end with '/'. A key starting with '^' is a regular expression,
  anything else is a path prefix. The first matching rule wins.
  rewrite: true strips the key from the path; "regex -> replacement"
  rewrites every match, with $0, $1, ... standing for the capture groups.
  WebSocket upgrades are never proxied.

${chalk.bold("Options:")}
  -c, --config <path>           Config file (default: ./devroute.json)
  -H, --host <host>             Host to bind (default: localhost)
  -p, --port <number>           Port to listen on (default: ${DEFAULT_PORT})
  --header <Name=value>         Add a response header (repeatable)
  -h, --help                    Show this help
  -v, --version                 Show the version

${chalk.bold("Environment variables:")}
  DEVROUTE_CONFIG=<path>        Config file path
  DEVROUTE_HOST=<host>          Host to bind
  DEVROUTE_PORT=<number>        Port to listen on
`);
}

function start(options: CliOptions): void {
  const logger = createConsoleLogger();
  const config = loadDevConfig({
    logger,
    overrides: {
      configPath: options.configPath,
      host: options.host,
      port: options.port,
      headers: options.headers,
    },
  });

  console.log(chalk.blue.bold("\ndevroute\n"));
  console.log(chalk.gray(describeConfig(config)));

  const server = createDevServer({ config, logger });

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(chalk.red(`Port ${config.port} is already in use.`));
      console.error(chalk.blue("Pick another port:"));
      console.error(chalk.cyan(`  devroute -p ${config.port + 1}`));
    } else if (err.code === "EACCES") {
      console.error(chalk.red(`Permission denied for port ${config.port}.`));
      console.error(chalk.blue("Use a non-privileged port:"));
      console.error(chalk.cyan(`  devroute -p ${DEFAULT_PORT}`));
    } else {
      console.error(chalk.red(`Server error: ${err.message}`));
    }
    process.exit(1);
  });

  server.listen(config.port, config.host, () => {
    const addr = server.address();
    const port = addr && typeof addr === "object" ? addr.port : config.port;
    console.log(chalk.green(`\nServing on ${formatUrl(config.host, port)}`));
  });

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    // Force exit if connections do not drain in time
    setTimeout(() => process.exit(0), EXIT_TIMEOUT_MS).unref();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printHelp();
    return;
  }
  if (options.version) {
    console.log(readVersion());
    return;
  }

  start(options);
}

try {
  main();
} catch (err: unknown) {
  if (err instanceof ConfigError) {
    console.error(chalk.red("Config error:"), err.message);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red("Error:"), message);
  }
  process.exit(1);
}
