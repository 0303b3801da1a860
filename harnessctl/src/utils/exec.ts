import { execFile } from "node:child_process";
import { promisify } from "node:util";

export const pExecFile = promisify(execFile);

export type CommandOutput = { stdout: string; stderr: string };

/** Signature of pExecFile as the harness calls it; swapped out in tests. */
export type CommandExecutor = (
  file: string,
  args: readonly string[],
  opts: { cwd?: string; env?: NodeJS.ProcessEnv; timeout?: number; maxBuffer?: number; shell?: boolean | string },
) => Promise<CommandOutput>;

export const execCommand: CommandExecutor = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, [...args], { ...opts, encoding: "utf8" });
  return { stdout, stderr };
};

export type ExecFailure = {
  exitCode: number | null;
  signal: string | null;
  killed: boolean;
  stdout: string;
  stderr: string;
  message: string;
};

function field(e: object, key: string): unknown {
  return key in e ? Reflect.get(e, key) : undefined;
}

/** Pull exit status and captured output out of an execFile rejection. */
export function describeExecFailure(e: unknown): ExecFailure {
  if (e === null || typeof e !== "object") {
    return { exitCode: null, signal: null, killed: false, stdout: "", stderr: "", message: String(e) };
  }
  const code = field(e, "code");
  const signal = field(e, "signal");
  const stdout = field(e, "stdout");
  const stderr = field(e, "stderr");
  const message = field(e, "message");
  return {
    exitCode: typeof code === "number" ? code : null,
    signal: typeof signal === "string" ? signal : null,
    killed: field(e, "killed") === true,
    stdout: typeof stdout === "string" ? stdout : "",
    stderr: typeof stderr === "string" ? stderr : "",
    message: typeof message === "string" ? message : String(e),
  };
}
