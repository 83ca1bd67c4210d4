import { afterEach, describe, it, expect } from "vitest";
import { createSocket, type Socket } from "node:dgram";
import { UdpTransport } from "./transport.js";

async function listen(): Promise<{ socket: Socket; port: number }> {
  const socket = createSocket("udp4");
  await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", () => resolve()));
  return { socket, port: socket.address().port };
}

describe("UdpTransport", () => {
  let receiver: Socket | undefined;

  afterEach(() => {
    receiver?.close();
    receiver = undefined;
  });

  it("delivers each message as one datagram", async () => {
    const { socket, port } = await listen();
    receiver = socket;
    const received: string[] = [];
    const done = new Promise<void>((resolve) => {
      socket.on("message", (msg) => {
        received.push(msg.toString("utf-8"));
        if (received.length === 2) resolve();
      });
    });

    const transport = new UdpTransport({ host: "127.0.0.1", port });
    await transport.send("line one\nline two");
    await transport.send("line three");
    await done;
    await transport.close();

    expect(received).toEqual(["line one\nline two", "line three"]);
  });
});
