/**
 * Tests for the token API application
 */

import type { Server } from "http";
import { buildConf } from "@otptoken/conf";
import { InMemoryDirectory } from "@otptoken/common";
import type { FetchLike } from "@otptoken/sync";
import { createTokenApp, type TokenAppOptions } from "./app";

let server: Server | undefined;

async function serve(options: TokenAppOptions): Promise<string> {
  const app = createTokenApp(options);
  const listener = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  server = listener;
  const address = listener.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("Server is not listening on a port");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  vi.restoreAllMocks();
  const listener = server;
  server = undefined;
  if (listener) {
    await new Promise<void>((resolve, reject) => {
      listener.close((err) => (err ? reject(err) : resolve()));
    });
  }
});

const syncBody = {
  user: "alice",
  password: "test-password",
  firstCode: "111111",
  secondCode: "222222",
};

describe("createTokenApp", () => {
  it("should log through the configured logger", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const directory = new InMemoryDirectory();

    await serve({
      conf: buildConf({ realm: "EXAMPLE.COM" }),
      store: directory,
      identities: directory,
    });

    expect(warn).toHaveBeenCalledWith("OTP token API ready for realm EXAMPLE.COM");
  });

  it("should serve the token routes", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const directory = new InMemoryDirectory();
    directory.addUser("alice");

    const baseUrl = await serve({
      conf: buildConf({ realm: "EXAMPLE.COM" }),
      store: directory,
      identities: directory,
      getCaller: () => "alice",
    });

    const res = await fetch(`${baseUrl}/otptoken`, { method: "POST" });
    expect(res.status).toBe(201);
    expect(res.headers.get("x-powered-by")).toBeNull();
    expect(await res.json()).toMatchObject({ owner: "alice", managedBy: ["alice"] });
  });

  it("should not mount sync without xmlrpcUri", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const directory = new InMemoryDirectory();

    const baseUrl = await serve({
      conf: buildConf({ realm: "EXAMPLE.COM" }),
      store: directory,
      identities: directory,
    });

    const res = await fetch(`${baseUrl}/otptoken/sync`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(syncBody),
    });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "NotFoundError",
      message: "sync is not enabled",
    });
  });

  it("should send sync requests to the configured endpoint", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const directory = new InMemoryDirectory();
    const fetchStub = vi.fn<FetchLike>(
      async () =>
        new Response(null, {
          status: 200,
          headers: { "X-IPA-TokenSync-Result": "error" },
        }),
    );

    const baseUrl = await serve({
      conf: buildConf({
        realm: "EXAMPLE.COM",
        xmlrpcUri: "https://ipa.example.com/ipa/xml",
      }),
      store: directory,
      identities: directory,
      fetch: fetchStub,
    });

    const res = await fetch(`${baseUrl}/otptoken/sync`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(syncBody),
    });
    expect(await res.json()).toEqual({
      status: "error",
      message: "Error contacting server!",
    });
    expect(fetchStub.mock.calls[0][0]).toBe(
      "https://ipa.example.com/ipa/session/sync_token",
    );
  });
});
