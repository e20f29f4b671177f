// backend/services/shared/src/health/types.ts
/**
 * Contracts for health checks and aggregate reports.
 */

export type HealthStatus = "UP" | "DOWN";

export interface HealthComponent {
  status: HealthStatus;
  details: string;
}

export interface HealthComponentResult extends HealthComponent {
  durationMs: number;
}

export interface IHealthCheck {
  readonly name: string;
  check(): Promise<HealthComponent>;
}

export interface HealthReport {
  status: HealthStatus;
  service: string;
  uptimeSec: number;
  components: Record<string, HealthComponentResult>;
}
