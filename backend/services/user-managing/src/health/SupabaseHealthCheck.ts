// backend/services/user-managing/src/health/SupabaseHealthCheck.ts
import type { HealthComponent, IHealthCheck } from "@shared/health/types";

/** Readiness: the service is useless while its only upstream is unreachable. */
export class SupabaseHealthCheck implements IHealthCheck {
  public readonly name = "supabase";

  constructor(private readonly upstream: { ping(): Promise<boolean> }) {}

  public async check(): Promise<HealthComponent> {
    return (await this.upstream.ping())
      ? { status: "UP", details: "Supabase GraphQL endpoint reachable." }
      : { status: "DOWN", details: "Supabase GraphQL endpoint unreachable." };
  }
}
