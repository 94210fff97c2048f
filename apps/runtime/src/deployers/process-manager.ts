import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";

/** How a detached service entry script is executed. */
export interface Launcher {
  command: string;
  args: string[];
}

/** Node with the tsx loader, resolved from here so the child finds it from any cwd. */
export const defaultLauncher: Launcher = {
  command: process.execPath,
  args: ["--import", import.meta.resolve("tsx")],
};

export interface StartProcessOptions {
  script: string;
  cwd: string;
  logFile: string;
  env?: Record<string, string>;
  launcher?: Launcher;
}

/**
 * Spawns `script` in its own process group with stdout and stderr appended
 * to `logFile`. The child outlives the parent unless stopped.
 */
export function startDetachedProcess(options: StartProcessOptions): ChildProcess {
  const launcher = options.launcher ?? defaultLauncher;
  fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
  const out = fs.openSync(options.logFile, "a");
  try {
    const child = spawn(launcher.command, [...launcher.args, options.script], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["ignore", out, out],
      detached: true,
    });
    child.unref();
    return child;
  } finally {
    fs.closeSync(out);
  }
}

export function createPidFile(pidFile: string, pid: number): void {
  fs.mkdirSync(path.dirname(pidFile), { recursive: true });
  fs.writeFileSync(pidFile, `${pid}\n`);
}

export function removePidFile(pidFile: string): void {
  fs.rmSync(pidFile, { force: true });
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessRunning(pid)) {
      return true;
    }
    await delay(100);
  }
  return !isProcessRunning(pid);
}

function signal(pid: number, sig: NodeJS.Signals): void {
  try {
    process.kill(pid, sig);
  } catch (err) {
    if (isProcessRunning(pid)) {
      throw err;
    }
  }
}

/**
 * Sends SIGTERM and waits up to `timeoutMs` for the process to exit, then
 * SIGKILLs it. Resolves true when the process exited on its own.
 */
export async function stopProcessGracefully(pid: number, timeoutMs: number): Promise<boolean> {
  if (!isProcessRunning(pid)) {
    return true;
  }
  signal(pid, "SIGTERM");
  if (await waitForExit(pid, timeoutMs)) {
    return true;
  }
  signal(pid, "SIGKILL");
  await waitForExit(pid, 1000);
  return false;
}
