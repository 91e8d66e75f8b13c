import fs from "fs";
import http from "http";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { createProperties } from "./core/properties";
import { createRegistry, DEFAULT_APPEARANCE } from "./core/registry";
import type { SessionRegistry } from "./core/registry";
import type { ApiContext } from "./api/context";
import type { LaunchSpec, ProbeResult } from "./types/domain";

describe("http api", () => {
  let dir: string;
  let file: string;
  let registry: SessionRegistry;
  let server: http.Server;
  let base: string;
  let launched: LaunchSpec[];
  let probeResult: ProbeResult;
  let ctx: ApiContext;

  async function start() {
    server = http.createServer(createApp(ctx, []));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("no TCP address");
    base = `http://127.0.0.1:${address.port}`;
  }

  function send(method: string, route: string, body?: unknown) {
    return fetch(base + route, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "api-"));
    file = path.join(dir, "prefs");
    registry = createRegistry(createProperties(), file);
    registry.ensureDefaults({ ...DEFAULT_APPEARANCE });
    launched = [];
    probeResult = { ok: true };
    ctx = {
      registry,
      launcher: { launch: (spec) => launched.push(spec) },
      clients: { ssh: "/usr/bin/ssh" },
      strategy: { kind: "emulator", program: "/usr/bin/xterm" },
      probe: async () => probeResult,
      env: { USER: "tester" }
    };
    await start();
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves, lists, loads and deletes a session", async () => {
    const saved = await send("PUT", "/api/sessions/work", {
      hostname: "10.0.0.5",
      port: "2222",
      foreground: "#00ff00",
      geometry: "132x24"
    });
    expect(saved.status).toBe(200);

    expect(await (await send("GET", "/api/sessions")).json()).toEqual({ names: ["work"] });

    const loaded = await (await send("GET", "/api/sessions/work")).json();
    expect(loaded).toEqual({
      name: "work",
      hostname: "10.0.0.5",
      port: "2222",
      mode: "ssh",
      background: "#ffffff",
      foreground: "#00ff00",
      geometry: "132x24",
      scrollback: 10000,
      fontSize: 10,
      keyPath: ""
    });
    expect(fs.readFileSync(file, "utf8")).toContain("work.foreground=-16711936\n");

    expect((await send("DELETE", "/api/sessions/work")).status).toBe(200);
    expect((await send("GET", "/api/sessions/work")).status).toBe(404);
  });

  it("rejects a session without a hostname", async () => {
    const res = await send("PUT", "/api/sessions/work", { port: "22" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Please enter a hostname, a port number, and a session name.",
      kind: "validation"
    });
  });

  it("rejects bad colors and reserved names", async () => {
    expect((await send("PUT", "/api/sessions/work", { hostname: "h", background: "blue" })).status).toBe(422);
    expect((await send("PUT", "/api/sessions/default", { hostname: "h" })).status).toBe(400);
  });

  it("rejects line breaks in stored values", async () => {
    const res = await send("PUT", "/api/sessions/work", { hostname: "h\nevil.name=evil", port: "22" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "hostname must not contain line breaks", kind: "validation" });
    expect((await send("PUT", "/api/sessions/work", { hostname: "h", keyPath: "/k\r" })).status).toBe(400);

    const reloaded = createProperties();
    reloaded.load(file);
    expect(createRegistry(reloaded, file).listSessionNames()).toEqual([]);
  });

  it("bounds scrollback and font size", async () => {
    expect((await send("PUT", "/api/sessions/work", { hostname: "h", scrollback: 1e21 })).status).toBe(400);
    expect((await send("PUT", "/api/sessions/work", { hostname: "h", scrollback: 20001 })).status).toBe(400);
    expect((await send("PUT", "/api/sessions/work", { hostname: "h", fontSize: 5 })).status).toBe(400);
    expect((await send("PUT", "/api/defaults", { fontSize: 21 })).status).toBe(400);

    expect((await send("PUT", "/api/sessions/work", { hostname: "h", scrollback: 20000, fontSize: 6 })).status).toBe(200);
    expect(await (await send("GET", "/api/sessions/work")).json()).toMatchObject({ scrollback: 20000, fontSize: 6 });
  });

  it("does not serve the defaults as a session", async () => {
    expect((await send("GET", "/api/sessions/default")).status).toBe(404);
    expect((await send("POST", "/api/launch/preview", { session: "default" })).status).toBe(400);
  });

  it("uses the telnet port when switching protocol", async () => {
    const res = await send("PUT", "/api/sessions/router", { hostname: "router", mode: "telnet" });
    expect(await res.json()).toMatchObject({ mode: "telnet", port: "23" });
  });

  it("updates the defaults", async () => {
    const res = await send("PUT", "/api/defaults", { fontSize: 14, background: "#000000" });
    expect(res.status).toBe(200);
    const defaults = await (await send("GET", "/api/defaults")).json();
    expect(defaults).toMatchObject({ fontSize: 14, background: "#000000", foreground: "#000000" });
  });

  it("previews an emulator launch without spawning", async () => {
    const res = await send("POST", "/api/launch/preview", { hostname: "10.0.0.5", port: "2222" });
    const spec = await res.json();
    expect(spec).toMatchObject({ kind: "emulator", command: "/usr/bin/ssh -p 2222 tester@10.0.0.5" });
    expect(spec).toHaveProperty("args", [
      "-T", "tester@10.0.0.5",
      "-geometry", "80x24",
      "-sl", "10000",
      "-fa", "mono-10",
      "-fg", "rgb:00/00/00",
      "-bg", "rgb:ff/ff/ff",
      "-e", "/usr/bin/ssh -p 2222 tester@10.0.0.5"
    ]);
    expect(launched).toEqual([]);
  });

  it("launches a stored session after probing", async () => {
    await send("PUT", "/api/sessions/work", { hostname: "alice@10.0.0.5", port: "2200", keyPath: "/keys/work" });
    const res = await send("POST", "/api/launch", { session: "work" });
    expect(res.status).toBe(202);
    expect(launched).toHaveLength(1);
    expect(launched[0].command).toBe("/usr/bin/ssh -p 2200 -i /keys/work alice@10.0.0.5");
  });

  it("keeps the stored port when the mode is unchanged", async () => {
    await send("PUT", "/api/sessions/work", { hostname: "alice@10.0.0.5", port: "2200" });
    const spec = await (await send("POST", "/api/launch/preview", { session: "work", mode: "ssh" })).json();
    expect(spec).toMatchObject({ command: "/usr/bin/ssh -p 2200 alice@10.0.0.5" });
  });

  it("does not launch when the probe fails", async () => {
    probeResult = { ok: false, reason: "timeout", message: "Connection to h:22 timed out" };
    const res = await send("POST", "/api/launch", { hostname: "h", port: "22" });
    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({ error: "Connection to h:22 timed out", kind: "timeout" });
    expect(launched).toEqual([]);
  });

  it("reports a missing telnet client", async () => {
    const res = await send("POST", "/api/launch/preview", { hostname: "h", mode: "telnet" });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "telnet not found on the system.", kind: "not_found" });
  });

  it("reports malformed hostnames", async () => {
    const res = await send("POST", "/api/launch/preview", { hostname: "@h", port: "22" });
    expect(res.status).toBe(422);
  });

  it("converts colors", async () => {
    expect(await (await send("GET", "/api/colors/decode?value=-1")).json()).toEqual({ hex: "#ffffff", fallback: false });
    expect(await (await send("GET", "/api/colors/decode?value=oops")).json()).toEqual({ hex: "#000000", fallback: true });
    expect(await (await send("GET", "/api/colors/encode?hex=%23000000")).json()).toEqual({ value: "-16777216" });
  });

  it("runs the self test", async () => {
    const res = await (await send("GET", "/readyz?selftest=1")).json();
    expect(res).toMatchObject({ ok: true, roundTrip: true, launch: true });
  });
});
