import { exec as cpExec } from "node:child_process";
import { promisify } from "node:util";
import { defineTool } from "../define.js";

const exec = promisify(cpExec);

export interface ExecOutcome {
  stdout: string;
  stderr: string;
  exit_code: number | string;
}

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function asExecFailure(e: unknown): ExecFailure {
  if (typeof e !== "object" || e === null) return { message: String(e) };
  const failure: ExecFailure = {};
  if ("code" in e && (typeof e.code === "number" || typeof e.code === "string")) failure.code = e.code;
  if ("stdout" in e && typeof e.stdout === "string") failure.stdout = e.stdout;
  if ("stderr" in e && typeof e.stderr === "string") failure.stderr = e.stderr;
  if ("message" in e && typeof e.message === "string") failure.message = e.message;
  return failure;
}

/**
 * Runs a shell command; a non-zero exit is reported in the outcome, not thrown.
 * Aborting `signal` kills the child and yields exit code "ABORT_ERR".
 */
export async function runShell(cmd: string, cwd: string, timeoutMs: number, signal?: AbortSignal): Promise<ExecOutcome> {
  const shell = process.platform === "win32" ? undefined : "/bin/bash";
  try {
    const { stdout, stderr } = await exec(cmd, {
      cwd,
      timeout: timeoutMs,
      shell,
      encoding: "utf8",
      maxBuffer: 8 * 1024 * 1024,
      signal,
    });
    return { stdout, stderr, exit_code: 0 };
  } catch (e) {
    const failure = asExecFailure(e);
    return {
      stdout: failure.stdout ?? "",
      stderr: failure.stderr ?? failure.message ?? "",
      exit_code: failure.code ?? "ERR",
    };
  }
}

export const cliExec = defineTool(
  {
    name: "cli_exec",
    description: "Run a shell command and return its stdout, stderr and exit code.",
    parameters: {
      cmd: { type: "string", description: "Command line to run", required: true },
      cwd: { type: "string", description: "Working directory (defaults to the process cwd)", required: false },
      timeout_s: { type: "number", description: "Timeout in seconds (default 15)", required: false },
    },
  },
  async (args) => {
    const cmd = String(args.cmd).trim();
    if (!cmd) throw new Error("cmd must not be empty");
    const cwd = typeof args.cwd === "string" ? args.cwd : process.cwd();
    const timeoutMs = Math.max(1, typeof args.timeout_s === "number" ? args.timeout_s : 15) * 1000;
    return runShell(cmd, cwd, timeoutMs);
  },
);
