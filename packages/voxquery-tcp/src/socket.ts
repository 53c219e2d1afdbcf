// TCP socket setup.

import net from "node:net";
import { ConnectionError } from "voxquery-core";

/**
 * Open a TCP connection.
 *
 * Rejects with ConnectionError (kind "connect") if the peer refuses or the
 * connection is not up within `timeoutMs`.
 */
export function openSocket(host: string, port: number, timeoutMs = 10000): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const onError = (err: Error) => {
      clearTimeout(timer);
      reject(ConnectionError.connect(`connect to ${host}:${port} failed: ${err.message}`, err));
    };

    const timer = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(ConnectionError.connect(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeListener("error", onError);
      resolve(socket);
    });
  });
}
