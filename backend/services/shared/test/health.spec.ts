// backend/services/shared/test/health.spec.ts
import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import { HealthService } from "@shared/health/HealthService";
import { createHealthRouter } from "@shared/health/mount";
import {
  CpuHealthCheck,
  formatLoadAverage,
  measureCpuUsage,
} from "@shared/health/checks/CpuHealthCheck";
import { DiskHealthCheck, diskUsedPercent } from "@shared/health/checks/DiskHealthCheck";
import type { HealthStatus, IHealthCheck } from "@shared/health/types";

function fixedCheck(name: string, status: HealthStatus, details = `${name} ${status}`): IHealthCheck {
  return { name, check: async () => ({ status, details }) };
}

describe("HealthService", () => {
  it("runs checks, times them, and reports DOWN if any component is DOWN", async () => {
    let t = 1_000;
    const tick = (ms: number, status: HealthStatus, name: string): IHealthCheck => ({
      name,
      check: async () => {
        t += ms;
        return { status, details: `${name} ${status}` };
      },
    });
    const svc = new HealthService("svc-test", () => t)
      .add(tick(5, "UP", "a"))
      .add(tick(7, "DOWN", "b"));

    t = 61_000;
    const report = await svc.run();

    expect(report).toEqual({
      status: "DOWN",
      service: "svc-test",
      uptimeSec: 60,
      components: {
        a: { status: "UP", details: "a UP", durationMs: 5 },
        b: { status: "DOWN", details: "b DOWN", durationMs: 7 },
      },
    });
  });

  it("runs only the named checks", async () => {
    const svc = new HealthService("svc-test", () => 0)
      .add(fixedCheck("a", "UP"))
      .add(fixedCheck("b", "DOWN"));

    const report = await svc.run(["a"]);
    expect(report.status).toBe("UP");
    expect(Object.keys(report.components)).toEqual(["a"]);
  });

  it("turns a throwing check into DOWN", async () => {
    const svc = new HealthService("svc-test", () => 0).add({
      name: "boom",
      check: async () => {
        throw new Error("kaboom");
      },
    });

    expect(await svc.runOne("boom")).toEqual({
      status: "DOWN",
      details: "Failed to check boom health: kaboom",
      durationMs: 0,
    });
  });

  it("rejects duplicate and unknown checks", async () => {
    const svc = new HealthService("svc-test").add(fixedCheck("a", "UP"));
    expect(() => svc.add(fixedCheck("a", "UP"))).toThrow('HealthService: duplicate check "a"');
    await expect(svc.runOne("zzz")).rejects.toThrow('HealthService: unknown check "zzz"');
  });
});

describe("CpuHealthCheck", () => {
  const base = {
    maxPercent: 85,
    sampleMs: 0,
    loadavg: () => [0.5, 0.25, 1],
    cpuCount: () => 4,
  };

  it("is UP at or below the threshold", async () => {
    const check = new CpuHealthCheck({ ...base, measureUsage: async () => 42.26 });
    expect(await check.check()).toEqual({
      status: "UP",
      details: "CPU usage at 42.3%. Load average (1m, 5m, 15m): (0.50, 0.25, 1.00). Logical CPUs: 4",
    });

    const edge = new CpuHealthCheck({ ...base, measureUsage: async () => 85 });
    expect((await edge.check()).status).toBe("UP");
  });

  it("is DOWN above the threshold", async () => {
    const check = new CpuHealthCheck({ ...base, measureUsage: async () => 90 });
    expect(await check.check()).toEqual({
      status: "DOWN",
      details: "High CPU usage detected: 90%. Load average (1m, 5m, 15m): (0.50, 0.25, 1.00)",
    });
  });

  it("formats load averages with two decimals", () => {
    expect(formatLoadAverage([1, 0.125, 2.5])).toBe("(1.00, 0.13, 2.50)");
  });

  it("measures a percentage from the host counters", async () => {
    const usage = await measureCpuUsage(10);
    expect(usage).toBeGreaterThanOrEqual(0);
    expect(usage).toBeLessThanOrEqual(100);
  });
});

describe("DiskHealthCheck", () => {
  it("computes used space like df", () => {
    expect(diskUsedPercent({ bsize: 4096, blocks: 1000, bfree: 300, bavail: 200 })).toBeCloseTo(
      77.7778,
      3
    );
    expect(diskUsedPercent({ bsize: 4096, blocks: 0, bfree: 0, bavail: 0 })).toBe(0);
  });

  it("is UP below the threshold", async () => {
    const check = new DiskHealthCheck({
      maxPercent: 90,
      path: "/",
      statfs: async () => ({ bsize: 4096, blocks: 1000, bfree: 300, bavail: 200 }),
    });
    expect(await check.check()).toEqual({
      status: "UP",
      details: "Disk usage is healthy: 77.8% used.",
    });
  });

  it("is DOWN at the threshold", async () => {
    const check = new DiskHealthCheck({
      maxPercent: 90,
      path: "/",
      statfs: async () => ({ bsize: 4096, blocks: 1000, bfree: 100, bavail: 100 }),
    });
    expect(await check.check()).toEqual({
      status: "DOWN",
      details: "Disk usage is critical: 90% used.",
    });
  });

  it("reads the real filesystem by default", async () => {
    const result = await new DiskHealthCheck({ maxPercent: 100, path: "/" }).check();
    expect(result.details).toMatch(/^Disk usage is (healthy|critical): [\d.]+% used\.$/);
  });
});

describe("createHealthRouter", () => {
  function buildApp() {
    const health = new HealthService("svc-test")
      .add(fixedCheck("cpu", "UP"))
      .add(fixedCheck("disk", "DOWN"))
      .add(fixedCheck("supabase", "UP"));
    const app = express();
    app.use(
      "/svc/health",
      createHealthRouter({ health, liveness: ["cpu", "disk"], readiness: ["supabase"] })
    );
    return app;
  }

  it("serves liveness with 503 when a liveness check is DOWN", async () => {
    const r = await request(buildApp()).get("/svc/health/general");

    expect(r.status).toBe(503);
    expect(r.headers["cache-control"]).toBe("no-store");
    expect(r.body.status).toBe("DOWN");
    expect(r.body.service).toBe("svc-test");
    expect(Object.keys(r.body.components)).toEqual(["cpu", "disk"]);
    expect(r.body.components.disk.details).toBe("disk DOWN");
  });

  it("serves readiness from its own checks", async () => {
    const r = await request(buildApp()).get("/svc/health/readiness");

    expect(r.status).toBe(200);
    expect(r.body.status).toBe("UP");
    expect(Object.keys(r.body.components)).toEqual(["supabase"]);
  });

  it("serves a single component by name", async () => {
    const r = await request(buildApp()).get("/svc/health/cpu");

    expect(r.status).toBe(200);
    expect(r.body.status).toBe("UP");
    expect(r.body.details).toBe("cpu UP");
    expect(typeof r.body.durationMs).toBe("number");
  });

  it("falls through for unknown components", async () => {
    const r = await request(buildApp()).get("/svc/health/memory");
    expect(r.status).toBe(404);
  });

  it("refuses unregistered check names", () => {
    const health = new HealthService("svc-test").add(fixedCheck("cpu", "UP"));
    expect(() =>
      createHealthRouter({ health, liveness: ["cpu"], readiness: ["supabase"] })
    ).toThrow('createHealthRouter: check "supabase" is not registered');
  });
});
