import { createServer, type Server } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { startServer } from "../src/server.js";

const listen = (server: Server): Promise<number> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, () => {
      const address = server.address();
      if (typeof address === "object" && address) {
        resolve(address.port);
      } else {
        reject(new Error("Server has no TCP address"));
      }
    });
  });

const close = (server: Server): Promise<void> =>
  new Promise((resolve) => {
    server.close(() => resolve());
  });

describe("startServer", () => {
  let blocker: Server | undefined;

  afterEach(async () => {
    if (blocker) await close(blocker);
    blocker = undefined;
  });

  it("rejects when the port is already taken", async () => {
    blocker = createServer();
    const port = await listen(blocker);

    await expect(startServer(port)).rejects.toMatchObject({ code: "EADDRINUSE" });
  });
});
