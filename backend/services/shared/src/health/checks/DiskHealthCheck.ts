// backend/services/shared/src/health/checks/DiskHealthCheck.ts
import fsp from "node:fs/promises";
import type { HealthComponent, IHealthCheck } from "../types";

/** The subset of fs.StatsFs the check reads. */
export type FsBlocks = {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
};

/**
 * Used space as a share of what non-root users can reach
 * (used / (used + available)), matching `df`.
 */
export function diskUsedPercent(s: FsBlocks): number {
  const used = (s.blocks - s.bfree) * s.bsize;
  const avail = s.bavail * s.bsize;
  const denom = used + avail;
  if (denom <= 0) return 0;
  return (used / denom) * 100;
}

export interface DiskHealthCheckOptions {
  /** Usage at or above this is DOWN. */
  maxPercent: number;
  path: string;
  statfs?: (path: string) => Promise<FsBlocks>;
}

export class DiskHealthCheck implements IHealthCheck {
  public readonly name = "disk";

  constructor(private readonly opts: DiskHealthCheckOptions) {}

  public async check(): Promise<HealthComponent> {
    const statfs = this.opts.statfs ?? ((p: string) => fsp.statfs(p));
    const percent = Math.round(diskUsedPercent(await statfs(this.opts.path)) * 10) / 10;

    if (percent >= this.opts.maxPercent) {
      return {
        status: "DOWN",
        details: `Disk usage is critical: ${percent}% used.`,
      };
    }
    return {
      status: "UP",
      details: `Disk usage is healthy: ${percent}% used.`,
    };
  }
}
