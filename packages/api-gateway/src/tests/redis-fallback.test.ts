import { afterAll, describe, expect, it, vi } from "vitest";
import { Redis } from "ioredis";
import { initConfig } from "../config/index.js";
import { buildApp } from "../app.js";

const previousUrl = process.env["REDIS_URL"];

afterAll(() => {
  vi.restoreAllMocks();
  if (previousUrl === undefined) delete process.env["REDIS_URL"];
  else process.env["REDIS_URL"] = previousUrl;
});

describe("rate-limit store fallback", () => {
  it("disconnects an unreachable Redis and serves from memory", async () => {
    const disconnect = vi.spyOn(Redis.prototype, "disconnect");
    process.env["LOG_LEVEL"] = "silent";
    process.env["REDIS_URL"] = "redis://127.0.0.1:1"; // nothing listens on port 1

    initConfig();
    const app = await buildApp();
    await app.ready();

    expect(disconnect).toHaveBeenCalledTimes(1);

    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);

    await app.close();
  });
});
