import net from "net";
import { afterEach, describe, expect, it } from "vitest";
import { assertReachable, checkTcpReachable, parsePort } from "./probe";
import { TimeoutError, UnreachableError, ValidationError } from "./errors";

function listen(): Promise<net.Server> {
  return new Promise((resolve) => {
    const server = net.createServer((socket) => socket.destroy());
    server.listen(0, "127.0.0.1", () => resolve(server));
  });
}

function portOf(server: net.Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
  return address.port;
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("checkTcpReachable", () => {
  let server: net.Server | undefined;

  afterEach(async () => {
    if (server?.listening) await close(server);
    server = undefined;
  });

  it("succeeds against a listening port", async () => {
    server = await listen();
    const port = portOf(server);
    await expect(checkTcpReachable("127.0.0.1", port, 2)).resolves.toEqual({ ok: true });
  });

  it("reports a refused connection as unreachable", async () => {
    server = await listen();
    const port = portOf(server);
    await close(server);
    const result = await checkTcpReachable("127.0.0.1", port, 2);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("unreachable");
  });

  it("reports names that do not resolve", async () => {
    const lookup = () => Promise.reject(new Error("ENOTFOUND"));
    await expect(checkTcpReachable("nowhere.invalid", 22, 1, { lookup })).resolves.toEqual({
      ok: false,
      reason: "unknown-host",
      message: "Unknown Host: nowhere.invalid"
    });
  });

  it("times out when the name never resolves", async () => {
    const lookup = () => new Promise<never>(() => undefined);
    const started = Date.now();
    const result = await checkTcpReachable("slow.invalid", 22, 0.05, { lookup });
    expect(result).toEqual({ ok: false, reason: "timeout", message: "Connection to slow.invalid:22 timed out" });
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("counts a slow lookup against the same budget", async () => {
    server = await listen();
    const port = portOf(server);
    const lookup = () => new Promise<string>((resolve) => setTimeout(() => resolve("127.0.0.1"), 300));
    const started = Date.now();
    const result = await checkTcpReachable("127.0.0.1", port, 0.05, { lookup });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("timeout");
    expect(Date.now() - started).toBeLessThan(300);
  });
});

describe("assertReachable", () => {
  it("maps failures to distinct errors", () => {
    expect(() => assertReachable({ ok: true })).not.toThrow();
    expect(() => assertReachable({ ok: false, reason: "timeout", message: "t" })).toThrow(TimeoutError);
    expect(() => assertReachable({ ok: false, reason: "unreachable", message: "u" })).toThrow(UnreachableError);
    expect(() => assertReachable({ ok: false, reason: "unknown-host", message: "n" })).toThrow(UnreachableError);
  });
});

describe("parsePort", () => {
  it("accepts 1-65535 only", () => {
    expect(parsePort(" 22 ")).toBe(22);
    expect(() => parsePort("0")).toThrow(ValidationError);
    expect(() => parsePort("70000")).toThrow(ValidationError);
    expect(() => parsePort("ssh")).toThrow(ValidationError);
  });
});
