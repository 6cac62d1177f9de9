import { spawn } from "node:child_process";

export type RunCmdOptions = {
  cwd?: string;
  signal?: AbortSignal;
  /** written to the child's stdin, which is then closed */
  input?: string;
  env?: NodeJS.ProcessEnv;
};

export type RunCmdResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (cmd: string, args: string[], opts?: RunCmdOptions) => Promise<RunCmdResult>;

export const runCmd: CommandRunner = (cmd, args, opts) => {
  return new Promise<RunCmdResult>((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: opts?.env,
      stdio: ["pipe", "pipe", "pipe"],
      signal: opts?.signal,
      windowsHide: true,
    });

    let stderr = "";
    let stdout = "";
    child.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));
    child.on("error", reject);
    child.on("close", (code) => {
      if (code === 0) return resolve({ stdout, stderr });
      reject(new Error(`${cmd} failed code=${code}\n${stdout}\n${stderr}`));
    });

    // the child may exit without reading stdin
    child.stdin.on("error", () => undefined);
    child.stdin.end(opts?.input ?? "");
  });
};

/** splits a configured command line on whitespace; quoting is not supported */
export function splitCommand(line: string): { cmd: string; args: string[] } {
  const [cmd = "", ...args] = line.trim().split(/\s+/);
  return { cmd, args };
}
