import { homedir } from "os";
import { parseArgs } from "util";
import chalk from "chalk";

import type { Context } from "./types";
import { newWorkflow } from "./commands/new";
import { link } from "./commands/link";
import { vendor } from "./commands/vendor";
import { pack } from "./commands/package";
import { loadConfig } from "./lib/config";
import { NodefredErrorCode, describeError, isNodefredError } from "./lib/errors";
import { configureLogging, type LogStream } from "./lib/log";
import { VERSION } from "./version";

const HELP = `
${chalk.bold("nodefred")}: build Node.js workflows for Alfred with ease

${chalk.dim("Usage:")}
  nodefred [--debug] <command> [options]

${chalk.dim("Commands:")}
  ${chalk.cyan("new")} <name> -k <keyword> -b <bundle-id>   Create a new workflow
      [--author <name>] [--website <url>] [--description <text>] [--no-git]
  ${chalk.cyan("link")} [--relink] [--same-path]            Create a symbolic link to this workflow in Alfred
  ${chalk.cyan("vendor")}                                   Install workflow dependencies
  ${chalk.cyan("package")}                                  Package the workflow for distribution

${chalk.dim("Options:")}
  -h, --help       Show this help
  -v, --version    Show version
  --debug          Debug logging

${chalk.dim("Examples:")}
  nodefred new "Google Suggest" -k g -b com.example.googlesuggest
  nodefred link --relink
  nodefred package
`;

export interface MainOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
  /** Log destination, stderr by default */
  logStream?: LogStream;
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    configureLogging({ level: "info", stream: options.logStream }).error(describeError(err));
    console.log("Run 'nodefred --help' for usage.");
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.version) {
    console.log(`nodefred v${VERSION}`);
    return 0;
  }

  const [command, ...rest] = positionals;

  if (values.help || !command) {
    console.log(HELP);
    return 0;
  }

  const debug = flag(values.debug, values["no-debug"], false);
  const log = configureLogging({ level: debug ? "debug" : "info", stream: options.logStream });

  try {
    const env = options.env ?? process.env;
    const home = options.home ?? homedir();
    const ctx: Context = {
      debug,
      cwd: options.cwd ?? process.cwd(),
      home,
      log,
      config: await loadConfig(env, home),
    };

    switch (command) {
      case "new":
        await newWorkflow(
          rest[0],
          {
            keyword: values.keyword,
            bundleId: values["bundle-id"],
            author: values.author,
            website: values.website,
            description: values.description,
            git: flag(values.git, values["no-git"], true),
          },
          ctx
        );
        return 0;

      case "link":
        await link(
          {
            relink: flag(values.relink, values["no-relink"], false),
            samePath: flag(values["same-path"], values["no-same-path"], false),
          },
          ctx
        );
        return 0;

      case "vendor":
        return (await vendor(ctx)) ? 0 : 1;

      case "package":
        await pack(ctx);
        return 0;

      default:
        log.error(`Unknown command: ${command}`);
        console.log("Run 'nodefred --help' for usage.");
        return 1;
    }
  } catch (err) {
    if (isNodefredError(err, NodefredErrorCode.NOT_A_PROJECT)) {
      log.critical(err.message);
    } else if (isNodefredError(err)) {
      log.error(err.message);
      if (err.context) {
        log.debug(JSON.stringify(err.context));
      }
    } else {
      log.error(`Error: ${describeError(err)}`);
      if (err instanceof Error && err.stack) {
        log.debug(err.stack);
      }
    }
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      debug: { type: "boolean" },
      "no-debug": { type: "boolean" },
      keyword: { type: "string", short: "k" },
      "bundle-id": { type: "string", short: "b" },
      author: { type: "string" },
      website: { type: "string" },
      description: { type: "string" },
      git: { type: "boolean" },
      "no-git": { type: "boolean" },
      relink: { type: "boolean" },
      "no-relink": { type: "boolean" },
      "same-path": { type: "boolean" },
      "no-same-path": { type: "boolean" },
    },
    allowPositionals: true,
  });
}

type ParsedArgs = ReturnType<typeof parseCliArgs>;

/**
 * `--flag` / `--no-flag` pair. The negative form wins when both are given.
 */
function flag(on: boolean | undefined, off: boolean | undefined, fallback: boolean): boolean {
  if (off) return false;
  if (on) return true;
  return fallback;
}
