// backend/services/user-managing/test/helpers/supabaseStub.ts
import { AxiosError, type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import { createSupabaseHttp } from "../../src/clients/SupabaseGraphqlClient";
import type { ServiceConfig } from "../../src/config";

/** One GraphQL request as the upstream would have seen it. */
export interface GraphqlCall {
  query: string;
  variables: Record<string, unknown>;
  authorization: string | undefined;
  apikey: string | undefined;
  requestId: string | undefined;
}

export type StubReply = { status: number; data: unknown } | Error;
export type StubHandler = (call: GraphqlCall) => StubReply;

const zBody = z.object({
  query: z.string(),
  variables: z.record(z.unknown()),
});

function header(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * In-process stand-in for Supabase's /graphql/v1: every request is recorded
 * and answered by `handler` without touching the network.
 */
export function stubSupabase(
  config: ServiceConfig,
  handler: StubHandler
): { http: AxiosInstance; calls: GraphqlCall[] } {
  const calls: GraphqlCall[] = [];

  const adapter: AxiosAdapter = async (req) => {
    const body = zBody.parse(JSON.parse(String(req.data)));
    const call: GraphqlCall = {
      ...body,
      authorization: header(req.headers.get("Authorization")),
      apikey: header(req.headers.get("apikey")),
      requestId: header(req.headers.get("x-request-id")),
    };
    calls.push(call);

    const reply = handler(call);
    if (reply instanceof Error) throw reply;
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config: req,
    };
  };

  return { http: createSupabaseHttp(config.supabase, adapter), calls };
}

export const ok = (data: unknown): StubReply => ({ status: 200, data: { data } });

export const timeout = () => new AxiosError("timeout of 5000ms exceeded", "ECONNABORTED");
export const refused = () => new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED");

/** Answers the readiness ping, delegating everything else. */
export function withPing(handler: StubHandler): StubHandler {
  return (call) =>
    call.query.includes("__typename") ? ok({ __typename: "Query" }) : handler(call);
}
