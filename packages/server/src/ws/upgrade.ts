/**
 * HTTP upgrade router.
 *
 * Both WebSocket servers run in `noServer` mode; this is the single
 * "upgrade" listener on the HTTP server, dispatching by pathname. Upgrades
 * to any other path are answered with 404 and the socket is destroyed.
 */

import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";

export type UpgradeHandler = (req: IncomingMessage, socket: Duplex, head: Buffer) => void;

export function attachUpgradeRouter(
  httpServer: HttpServer,
  routes: Record<string, UpgradeHandler>,
): () => void {
  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const { pathname } = new URL(req.url || "/", "http://localhost");
    const handler = routes[pathname];
    if (!handler) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    handler(req, socket, head);
  };

  httpServer.on("upgrade", onUpgrade);
  return () => {
    httpServer.off("upgrade", onUpgrade);
  };
}
