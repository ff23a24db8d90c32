import { configureLogging, type LogStream } from "../lib/log";
import { Environment } from "./environment";
import { ScriptFilterOutput } from "./model";
import { serialize } from "./serialize";

/**
 * The function a workflow author writes. Runs once per invocation and must
 * return synchronously.
 */
export type ScriptFilterHandler = (
  scriptPath: string,
  args: string[],
  env: Environment | undefined
) => ScriptFilterOutput;

/**
 * Process surface the wrapper touches. Defaults to the real process.
 */
export interface ScriptFilterIO {
  argv: string[];
  env: NodeJS.ProcessEnv;
  stdout: LogStream;
  stderr: LogStream;
  exit(code: number): never;
}

/**
 * Wrap a script filter's entry point.
 *
 * Reads the script path, Alfred's arguments and the environment, and sets
 * up logging right away (debug level outside Alfred or with Alfred's
 * debugger open). The returned function runs the handler and prints its
 * output as one line of JSON. A handler that returns anything other than a
 * `ScriptFilterOutput` ends the process with status 1 and nothing on stdout.
 *
 * ```js
 * scriptFilter((path, args, env) => new ScriptFilterOutput({ items: [...] }))();
 * ```
 */
export function scriptFilter(handler: ScriptFilterHandler, io: Partial<ScriptFilterIO> = {}): () => void {
  const proc: ScriptFilterIO = {
    argv: io.argv ?? process.argv,
    env: io.env ?? process.env,
    stdout: io.stdout ?? process.stdout,
    stderr: io.stderr ?? process.stderr,
    exit: io.exit ?? ((code: number) => process.exit(code)),
  };

  const scriptPath = proc.argv[1] ?? "";
  const args = proc.argv.slice(2);
  const environment = Environment.fromEnv(proc.env);

  const log = configureLogging({
    level: environment === undefined || environment.debug ? "debug" : "info",
    stream: proc.stderr,
  });

  if (environment === undefined) {
    log.warn("Not running in an Alfred environment");
  }

  return () => {
    const output: unknown = handler(scriptPath, args, environment);

    if (!(output instanceof ScriptFilterOutput)) {
      log.error(
        `The workflow returned an unexpected type: ${describeType(output)}, but expected ${ScriptFilterOutput.name}.`
      );
      log.debug(`Unexpected instance of type ${describeType(output)}: ${inspectValue(output)}`);
      proc.exit(1);
    }

    proc.stdout.write(serialize(output) + "\n");
  };
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}

function inspectValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
