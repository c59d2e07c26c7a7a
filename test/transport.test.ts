import { dial } from "../src/index";
import { closedPort, createTestServer } from "./helpers/server";

describe("dial", () => {
  it("connects to a listening server", async () => {
    const server = createTestServer();
    const port = await server.start();

    const socket = await dial("127.0.0.1", { port, timeout: 1000 });

    expect(socket.remotePort).toBe(port);
    socket.destroy();
    await server.stop();
  });

  it("fails on a refused connection", async () => {
    const port = await closedPort();

    await expect(dial("127.0.0.1", { port, timeout: 1000 })).rejects.toMatchObject({
      code: "ECONNREFUSED",
    });
  });

  it("gives up when aborted while connecting", async () => {
    const port = await closedPort();
    const controller = new AbortController();

    const pending = dial("127.0.0.1", { port, signal: controller.signal });
    controller.abort(new Error("stop"));

    await expect(pending).rejects.toThrow("stop");
  });

  it("does not connect when already aborted", async () => {
    const server = createTestServer();
    const port = await server.start();
    const controller = new AbortController();
    controller.abort(new Error("stop"));

    await expect(dial("127.0.0.1", { port, signal: controller.signal })).rejects.toThrow("stop");
    expect(server.connections).toBe(0);
    await server.stop();
  });
});
