import { spawn } from "node:child_process";
import { errorMessage, log } from "./log";

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export const execFile = async (
  file: string,
  args: string[],
  opts?: {
    cwd?: string;
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
  },
): Promise<ExecResult> => {
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  return await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      log.warn("exec timeout, killing process", { file, timeoutMs });
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (stdout += d));
    child.stderr.on("data", (d: string) => (stderr += d));

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code: code ?? (timedOut ? 137 : 0), stdout, stderr, timedOut });
    });
  });
};

/** Resolves a bare command name against PATH, like `which`. */
export const which = async (name: string): Promise<string | null> => {
  const cmd = process.platform === "win32" ? "where" : "which";
  try {
    const res = await execFile(cmd, [name], { timeoutMs: 5_000 });
    if (res.code !== 0) return null;
    const first = res.stdout.split(/\r?\n/).find((line) => line.trim());
    return first ? first.trim() : null;
  } catch (err) {
    log.debug("which failed", { name, err: errorMessage(err) });
    return null;
  }
};
