import execa from "execa";
import { NodefredError, NodefredErrorCode, describeError } from "./errors";

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  /** Stream the child's output to this process instead of capturing it. */
  inherit?: boolean;
}

export async function run(
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  try {
    const result = await execa(command, args, {
      cwd: options.cwd,
      stdio: options.inherit ? "inherit" : "pipe",
      reject: false,
    });
    return toResult(command, result);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: describeError(err),
    });
  }
}

export function runSync(command: string, args: string[], options: ExecOptions = {}): ExecResult {
  try {
    const result = execa.sync(command, args, {
      cwd: options.cwd,
      stdio: options.inherit ? "inherit" : "pipe",
      reject: false,
    });
    return toResult(command, result);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: describeError(err),
    });
  }
}

function toResult(
  command: string,
  result: {
    stdout?: string;
    stderr?: string;
    exitCode?: number;
    failed: boolean;
    killed: boolean;
    shortMessage?: string;
  }
): ExecResult {
  // execa reports ENOENT and friends through the result when reject is off
  if (result.exitCode === undefined && result.failed && !result.killed) {
    throw new NodefredError(NodefredErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: result.shortMessage,
    });
  }
  return {
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    exitCode: result.exitCode ?? 1,
  };
}
