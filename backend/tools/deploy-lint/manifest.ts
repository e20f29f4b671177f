// backend/tools/deploy-lint/manifest.ts
import * as yaml from "yaml";
import { z } from "zod";

/** The subset of apps/v1 Deployment the lint reads; other keys pass through. */

const zQuantity = z.union([z.string(), z.number()]);

const zResourceList = z
  .object({ cpu: zQuantity.optional(), memory: zQuantity.optional() })
  .passthrough();

const zProbe = z
  .object({
    httpGet: z
      .object({
        path: z.string(),
        port: z.union([z.number().int(), z.string()]),
      })
      .passthrough()
      .optional(),
    initialDelaySeconds: z.number().int().optional(),
    periodSeconds: z.number().int().optional(),
    timeoutSeconds: z.number().int().optional(),
    successThreshold: z.number().int().optional(),
    failureThreshold: z.number().int().optional(),
  })
  .passthrough();

const zEnvVar = z
  .object({
    name: z.string(),
    value: z.string().optional(),
    valueFrom: z
      .object({
        secretKeyRef: z
          .object({ name: z.string(), key: z.string() })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type EnvVar = z.infer<typeof zEnvVar>;

const zContainer = z
  .object({
    name: z.string(),
    image: z.string(),
    ports: z
      .array(
        z
          .object({ containerPort: z.number().int(), name: z.string().optional() })
          .passthrough()
      )
      .optional(),
    env: z.array(zEnvVar).optional(),
    resources: z
      .object({
        limits: zResourceList.optional(),
        requests: zResourceList.optional(),
      })
      .passthrough()
      .optional(),
    readinessProbe: zProbe.optional(),
    livenessProbe: zProbe.optional(),
  })
  .passthrough();
export type Container = z.infer<typeof zContainer>;

export const zDeployment = z
  .object({
    apiVersion: z.literal("apps/v1"),
    kind: z.literal("Deployment"),
    metadata: z
      .object({ name: z.string(), namespace: z.string().optional() })
      .passthrough(),
    spec: z
      .object({
        selector: z
          .object({ matchLabels: z.record(z.string()) })
          .passthrough(),
        template: z
          .object({
            metadata: z
              .object({ labels: z.record(z.string()).optional() })
              .passthrough()
              .optional(),
            spec: z
              .object({ containers: z.array(zContainer).min(1) })
              .passthrough(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();
export type Deployment = z.infer<typeof zDeployment>;

export type ParseResult =
  | { ok: true; deployment: Deployment }
  | { ok: false; errors: string[] };

export function parseDeployment(text: string): ParseResult {
  let doc: unknown;
  try {
    doc = yaml.parse(text);
  } catch (err) {
    return {
      ok: false,
      errors: [`manifest is not valid YAML: ${err instanceof Error ? err.message : String(err)}`],
    };
  }
  const parsed = zDeployment.safeParse(doc);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map(
        (i) => `${i.path.join(".") || "<root>"}: ${i.message}`
      ),
    };
  }
  return { ok: true, deployment: parsed.data };
}
