import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { createLogger } from "@stackgate/logger";
import { loadCliConfig } from "./config.js";
import {
  checkCommand,
  extractCommand,
  upCommand,
  EXIT_FAILURE,
} from "./commands.js";

const log = createLogger("cli");

const USAGE = `Usage: stackgate <command> [options]

Commands:
  check <topology.json>                  Validate a topology and print its start order
  up <topology.json> [--exit]            Start a topology; --exit returns once units settle
  extract --store <dir> [--network <n>]  Write the deployments environment file once

Environment:
  STACKGATE_STORE_DIR            Artifact store directory (overrides the topology)
  STACKGATE_GATE_TIMEOUT_MS      Default dependency wait bound, 0 = none
  STACKGATE_STOP_GRACE_MS        Grace period before units are killed on stop
  STACKGATE_INITIAL_BACKOFF_MS   First restart delay
  STACKGATE_MAX_BACKOFF_MS       Restart delay cap
  STACKGATE_LOG_LEVEL            silly | trace | debug | info | warn | error | fatal
  STACKGATE_LOG_FORMAT           pretty | json | hidden
`;

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      exit: { type: "boolean", default: false },
      store: { type: "string" },
      network: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command, target] = positionals;
  if (values.help || command === undefined) {
    process.stdout.write(USAGE);
    return values.help ? 0 : EXIT_FAILURE;
  }

  const config = loadCliConfig();

  switch (command) {
    case "check":
    case "up": {
      if (!target) {
        process.stderr.write(
          `Error: ${command} needs a topology file\n\n${USAGE}`,
        );
        return EXIT_FAILURE;
      }
      if (command === "check") {
        return checkCommand(resolve(target), config, print);
      }

      const controller = new AbortController();
      const shutdown = (signal: NodeJS.Signals): void => {
        log.info(`Received ${signal}, stopping`);
        controller.abort();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
      return upCommand(
        resolve(target),
        config,
        { exitWhenSettled: values.exit, signal: controller.signal },
        print,
      );
    }

    case "extract": {
      const store = values.store ?? config.STACKGATE_STORE_DIR;
      if (!store) {
        process.stderr.write(`Error: extract needs --store <dir>\n\n${USAGE}`);
        return EXIT_FAILURE;
      }
      return extractCommand(
        { store: resolve(store), network: values.network },
        print,
      );
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return EXIT_FAILURE;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal("stackgate failed:", err);
    process.exitCode = EXIT_FAILURE;
  },
);
