import net from 'node:net';
import { DEFAULT_PROBE_TIMEOUT_SECONDS, type ProbeResult } from '@zbx-provision/shared';

// Larger delays overflow and fire after 1 ms
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Single bounded TCP connection attempt. Resolves `reachable: true` as soon
 * as the handshake completes; refusal, timeout, lookup failure or an invalid
 * port resolve `reachable: false`. Never rejects, never retries.
 */
export function probeTcp(
  host: string,
  port: number,
  timeoutSeconds = DEFAULT_PROBE_TIMEOUT_SECONDS,
): Promise<ProbeResult> {
  const start = Date.now();

  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (reachable: boolean, error?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      const result: ProbeResult = { reachable, host, port, durationMs: Date.now() - start };
      if (error !== undefined) result.error = error;
      resolve(result);
    };

    // Covers DNS lookup as well as the handshake
    const timer = setTimeout(
      () => finish(false, 'timeout'),
      Math.min(timeoutSeconds * 1000, MAX_TIMER_MS),
    );

    socket.once('connect', () => finish(true));
    socket.once('error', (err: NodeJS.ErrnoException) => finish(false, err.code ?? err.message));

    try {
      socket.connect({ host, port });
    } catch (err: unknown) {
      finish(false, err instanceof Error ? err.message : String(err));
    }
  });
}
