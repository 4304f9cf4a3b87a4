import net from 'node:net';
import { logger } from '../utils/logger';

/**
 * Attempts one TCP connection to host:port.
 * Resolves true when the connection is accepted before the timeout; never rejects.
 */
export function tcpProbe(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host, port });

    const finish = (online: boolean, reason?: string) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      if (!online) {
        // Refusals are expected while a machine boots
        logger.debug(`TCP probe to ${host}:${port} failed`, { reason });
      }
      resolve(online);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false, `timed out after ${timeoutMs}ms`));
    socket.once('error', (error: Error) => finish(false, error.message));
  });
}
