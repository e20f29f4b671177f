// backend/services/user-managing/src/clients/SupabaseGraphqlClient.ts

/**
 * Client for Supabase's pg_graphql endpoint (`<SUPABASE_URL>/graphql/v1`).
 *
 * - Authenticates with the service-role key (bypasses row-level security);
 *   `apikey` carries the project's anon key as Supabase's gateway requires.
 * - Never throws raw axios errors: every failure becomes an HttpError the
 *   problem+json formatter can render.
 *
 * Status mapping:
 * - no response (network)     → 502 UPSTREAM_UNAVAILABLE
 * - timeout                   → 504 UPSTREAM_TIMEOUT
 * - upstream 4xx              → same status, UPSTREAM_ERROR
 * - any other non-2xx         → 502 UPSTREAM_ERROR
 * - 2xx with `errors`         → 400 GRAPHQL_ERROR
 * - 2xx with unexpected shape → 502 UPSTREAM_ERROR
 */

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";
import { z } from "zod";
import { HttpError, badGateway } from "@shared/http/errors";
import { logger } from "@shared/utils/logger";

export interface SupabaseGraphqlConfig {
  graphqlUrl: string;
  anonKey: string;
  serviceRoleKey: string;
  timeoutMs: number;
}

export type GraphqlVariables = Record<string, unknown>;

const zGraphqlEnvelope = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .optional(),
});

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

function bodyText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

/**
 * Axios instance bound to the GraphQL endpoint with Supabase's auth headers.
 * `adapter` replaces the transport (tests).
 */
export function createSupabaseHttp(
  cfg: SupabaseGraphqlConfig,
  adapter?: AxiosAdapter
): AxiosInstance {
  return axios.create({
    baseURL: cfg.graphqlUrl,
    timeout: cfg.timeoutMs,
    headers: {
      Authorization: `Bearer ${cfg.serviceRoleKey}`,
      apikey: cfg.anonKey,
      "Content-Type": "application/json",
      Accept: "application/json",
    },
    ...(adapter ? { adapter } : {}),
  });
}

export class SupabaseGraphqlClient {
  constructor(
    cfg: SupabaseGraphqlConfig,
    private readonly http: AxiosInstance = createSupabaseHttp(cfg)
  ) {}

  /** Run a query/mutation and validate `data` against `schema`. */
  public async request<S extends z.ZodTypeAny>(
    query: string,
    variables: GraphqlVariables,
    schema: S,
    opts: { requestId?: string; operation?: string } = {}
  ): Promise<z.infer<S>> {
    const operation = opts.operation ?? "anonymous";
    const t0 = Date.now();

    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.post<unknown>(
        "",
        { query, variables },
        {
          validateStatus: () => true,
          headers: opts.requestId ? { "x-request-id": opts.requestId } : {},
        }
      );
    } catch (err) {
      const code = axios.isAxiosError(err) ? err.code : undefined;
      logger.warn(
        { operation, code, err: err instanceof Error ? err.message : String(err) },
        "supabase graphql transport failure"
      );
      if (code && TIMEOUT_CODES.has(code)) {
        throw new HttpError(504, "Supabase did not respond in time", {
          code: "UPSTREAM_TIMEOUT",
        });
      }
      throw badGateway("Supabase is unreachable", "UPSTREAM_UNAVAILABLE");
    }

    logger.debug(
      { operation, status: res.status, durationMs: Date.now() - t0 },
      "supabase graphql response"
    );

    if (res.status < 200 || res.status >= 300) {
      const status = res.status >= 400 && res.status < 500 ? res.status : 502;
      throw new HttpError(status, bodyText(res.data) || `Supabase responded ${res.status}`, {
        code: "UPSTREAM_ERROR",
      });
    }

    const envelope = zGraphqlEnvelope.safeParse(res.data);
    if (!envelope.success) {
      throw badGateway("Unexpected response from Supabase GraphQL");
    }
    if (envelope.data.errors?.length) {
      throw new HttpError(
        400,
        envelope.data.errors.map((e) => e.message).join("; "),
        { code: "GRAPHQL_ERROR" }
      );
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      logger.warn(
        { operation, issues: parsed.error.issues },
        "supabase graphql data did not match the expected shape"
      );
      throw badGateway("Unexpected response from Supabase GraphQL");
    }
    return parsed.data;
  }

  /** Cheap reachability probe; never throws. */
  public async ping(): Promise<boolean> {
    try {
      await this.request(
        "query Ping { __typename }",
        {},
        z.object({ __typename: z.string() }),
        { operation: "Ping" }
      );
      return true;
    } catch {
      return false;
    }
  }
}
