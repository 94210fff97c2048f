import net from "node:net";

export function probePort(host: string, port: number, timeoutMs = 100): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (ok: boolean) => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

export async function probeHealth(url: string, timeoutMs = 1000): Promise<boolean> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    return res.ok;
  } catch {
    return false;
  }
}

export interface WaitForReadyOptions {
  host: string;
  port: number;
  timeoutMs: number;
  intervalMs?: number;
  /** Also require `GET /health` to answer 2xx once the port accepts connections. */
  healthCheck?: boolean;
  /** Gives up early when the thing being waited on has already died. */
  isFailed?: () => boolean;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolves true once the service is reachable, false on timeout or failure. */
export async function waitForReady(options: WaitForReadyOptions): Promise<boolean> {
  const { host, port, timeoutMs, intervalMs = 100, healthCheck = false, isFailed } = options;
  const deadline = Date.now() + timeoutMs;

  while (Date.now() < deadline) {
    if (isFailed?.()) {
      return false;
    }
    if (await probePort(host, port)) {
      if (!healthCheck || (await probeHealth(`http://${host}:${port}/health`))) {
        return true;
      }
    }
    await delay(intervalMs);
  }
  return false;
}
