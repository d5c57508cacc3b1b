import { describe, it, expect, afterEach, vi } from "vitest";
import { ChildProcess } from "child_process";
import type { Server } from "http";
import { ALIVE_TEXT, createWebApp } from "../src/web";
import { pingOnce, startPinger } from "../src/ping";
import { launchAll, type SpawnFn } from "../src/launcher";
import { pendingMigrations } from "../src/tools/migrate";

describe("web", () => {
  let server: Server | null = null;

  afterEach(async () => {
    const s = server;
    server = null;
    if (s) await new Promise<void>(resolve => s.close(() => resolve()));
  });

  async function listen(): Promise<string> {
    const s = createWebApp(() => 42.9).listen(0, "127.0.0.1");
    server = s;
    await new Promise<void>(resolve => s.once("listening", () => resolve()));
    const address = s.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    return `http://127.0.0.1:${address.port}`;
  }

  it("answers the alive check", async () => {
    const base = await listen();
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("x-powered-by")).toBeNull();
    expect(await res.text()).toBe(ALIVE_TEXT);
  });

  it("reports health with whole-second uptime", async () => {
    const base = await listen();
    const res = await fetch(`${base}/health`);
    expect(await res.json()).toEqual({ status: "ok", uptime: 42 });
  });
});

describe("pinger", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the status or null", async () => {
    expect(await pingOnce("http://x", async () => ({ status: 204 }))).toBe(204);
    expect(await pingOnce("http://x", async () => { throw new Error("ECONNREFUSED"); })).toBeNull();
  });

  it("pings at once and then on every interval until stopped", async () => {
    vi.useFakeTimers();
    const fetchFn = vi.fn(async (_url: string) => ({ status: 200 }));
    const stop = startPinger("http://x/health", 20, fetchFn);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(40_000);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    stop();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn).toHaveBeenCalledWith("http://x/health");
  });
});

describe("launcher", () => {
  it("starts every entry and forgets processes that exit", () => {
    const started: string[][] = [];
    const spawnFn: SpawnFn = (_command, args) => {
      if (args[0] === "broken.js") throw new Error("EACCES");
      started.push(args);
      return new ChildProcess();
    };
    const children = launchAll(
      [
        { name: "web", script: "web.js" },
        { name: "broken", script: "broken.js" },
        { name: "bot", script: "index.js" },
      ],
      spawnFn
    );
    expect(started).toEqual([["web.js"], ["index.js"]]);
    expect([...children.keys()]).toEqual(["web", "bot"]);

    children.get("web")?.emit("exit", 1, null);
    expect([...children.keys()]).toEqual(["bot"]);
  });
});

describe("migrations", () => {
  it("picks unapplied sql files in name order", () => {
    expect(pendingMigrations(["002_b.sql", "README.md", "001_init.sql", "003_c.sql"], new Set(["001_init.sql"]))).toEqual([
      "002_b.sql",
      "003_c.sql",
    ]);
  });
});
