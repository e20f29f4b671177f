// backend/services/shared/src/health/checks/CpuHealthCheck.ts
import os from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import type { HealthComponent, IHealthCheck } from "../types";

type CpuTimes = { idle: number; total: number };

function snapshot(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

/** Busy percentage across all logical CPUs over `sampleMs`. */
export async function measureCpuUsage(sampleMs: number): Promise<number> {
  const a = snapshot();
  await sleep(sampleMs);
  const b = snapshot();
  const total = b.total - a.total;
  if (total <= 0) return 0;
  return (1 - (b.idle - a.idle) / total) * 100;
}

export interface CpuHealthCheckOptions {
  /** Usage strictly above this is DOWN. */
  maxPercent: number;
  sampleMs: number;
  measureUsage?: (sampleMs: number) => Promise<number>;
  loadavg?: () => number[];
  cpuCount?: () => number;
}

const round1 = (n: number) => Math.round(n * 10) / 10;

export function formatLoadAverage(load: number[]): string {
  return `(${load.map((n) => n.toFixed(2)).join(", ")})`;
}

export class CpuHealthCheck implements IHealthCheck {
  public readonly name = "cpu";

  constructor(private readonly opts: CpuHealthCheckOptions) {}

  public async check(): Promise<HealthComponent> {
    const measure = this.opts.measureUsage ?? measureCpuUsage;
    const usage = round1(await measure(this.opts.sampleMs));
    const load = formatLoadAverage((this.opts.loadavg ?? os.loadavg)());
    const count = (this.opts.cpuCount ?? (() => os.cpus().length))();

    if (usage > this.opts.maxPercent) {
      return {
        status: "DOWN",
        details: `High CPU usage detected: ${usage}%. Load average (1m, 5m, 15m): ${load}`,
      };
    }
    return {
      status: "UP",
      details: `CPU usage at ${usage}%. Load average (1m, 5m, 15m): ${load}. Logical CPUs: ${count}`,
    };
  }
}
