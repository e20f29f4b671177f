// backend/services/shared/src/health/HealthService.ts
/**
 * Purpose:
 * - Aggregate and execute health checks; compute overall status.
 */

import type {
  IHealthCheck,
  HealthComponentResult,
  HealthReport,
  HealthStatus,
} from "./types";

export class HealthService {
  private readonly serviceName: string;
  private readonly startedAt: number;
  private readonly now: () => number;
  private readonly checks = new Map<string, IHealthCheck>();

  constructor(serviceName: string, now: () => number = Date.now) {
    this.serviceName = serviceName;
    this.now = now;
    this.startedAt = now();
  }

  public add(check: IHealthCheck): this {
    if (this.checks.has(check.name)) {
      throw new Error(`HealthService: duplicate check "${check.name}"`);
    }
    this.checks.set(check.name, check);
    return this;
  }

  public has(name: string): boolean {
    return this.checks.has(name);
  }

  /** Runs one check; a throwing check reports DOWN instead of propagating. */
  public async runOne(name: string): Promise<HealthComponentResult> {
    const c = this.checks.get(name);
    if (!c) throw new Error(`HealthService: unknown check "${name}"`);
    const t0 = this.now();
    try {
      const r = await c.check();
      return { ...r, durationMs: this.now() - t0 };
    } catch (err) {
      return {
        status: "DOWN",
        details: `Failed to check ${name} health: ${
          err instanceof Error ? err.message : String(err)
        }`,
        durationMs: this.now() - t0,
      };
    }
  }

  /** Runs the named checks (all when omitted) sequentially. */
  public async run(names?: readonly string[]): Promise<HealthReport> {
    const selected = names ?? [...this.checks.keys()];
    const components: Record<string, HealthComponentResult> = {};
    for (const name of selected) {
      components[name] = await this.runOne(name);
    }

    return {
      status: this.computeStatus(Object.values(components)),
      service: this.serviceName,
      uptimeSec: Math.floor((this.now() - this.startedAt) / 1000),
      components,
    };
  }

  private computeStatus(results: HealthComponentResult[]): HealthStatus {
    return results.some((r) => r.status === "DOWN") ? "DOWN" : "UP";
  }
}
