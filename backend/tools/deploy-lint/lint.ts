// backend/tools/deploy-lint/lint.ts

/**
 * Cross-checks the Kubernetes Deployment against the Dockerfile and against
 * what the service itself expects (required secrets, server modes, probe
 * routes). Each finding names a rule so CI output can be grepped.
 */

import {
  MODE_ENV,
  PORT_ENV,
  REQUIRED_SECRETS,
  SERVER_MODES,
} from "../../services/user-managing/src/config";
import {
  LIVENESS_PATH,
  READINESS_PATH,
} from "../../services/user-managing/src/routes/paths";
import { cmdPort, parseDockerfile, type DockerfileInfo } from "./dockerfile";
import { parseDeployment, type Container, type EnvVar } from "./manifest";
import { parseCpu, parseMemory } from "./quantity";

export type LintRule =
  | "manifest.schema"
  | "manifest.containers"
  | "dockerfile.syntax"
  | "port.container"
  | "port.expose"
  | "port.cmd"
  | "port.env"
  | "probe.missing"
  | "probe.port"
  | "probe.path"
  | "env.duplicate"
  | "env.mode"
  | "secret.key"
  | "secret.name"
  | "secret.required"
  | "secret.literal"
  | "resources.quantity"
  | "resources.request";

export interface Finding {
  rule: LintRule;
  message: string;
}

export interface LintInput {
  manifest: string;
  dockerfile: string;
}

function checkEnv(env: readonly EnvVar[], findings: Finding[]): void {
  const seen = new Set<string>();
  for (const e of env) {
    if (seen.has(e.name)) {
      findings.push({ rule: "env.duplicate", message: `env var ${e.name} is declared more than once` });
    }
    seen.add(e.name);
  }

  const secretRefs = env.flatMap((e) => {
    const ref = e.valueFrom?.secretKeyRef;
    return ref ? [{ env: e.name, ...ref }] : [];
  });

  for (const ref of secretRefs) {
    if (ref.key !== ref.env) {
      findings.push({
        rule: "secret.key",
        message: `env var ${ref.env} reads key "${ref.key}" from secret "${ref.name}"; expected key "${ref.env}"`,
      });
    }
  }

  const secretNames = [...new Set(secretRefs.map((r) => r.name))];
  if (secretNames.length > 1) {
    findings.push({
      rule: "secret.name",
      message: `secret references name more than one secret: ${secretNames.join(", ")}`,
    });
  }

  for (const key of REQUIRED_SECRETS) {
    const e = env.find((v) => v.name === key);
    if (!e) {
      findings.push({ rule: "secret.required", message: `required secret ${key} is not injected` });
    } else if (e.value !== undefined) {
      findings.push({
        rule: "secret.literal",
        message: `${key} is set as a literal value; inject it with secretKeyRef`,
      });
    } else if (!e.valueFrom?.secretKeyRef) {
      findings.push({ rule: "secret.required", message: `${key} is not read from a secret` });
    }
  }

  const mode = env.find((v) => v.name === MODE_ENV);
  if (mode?.value !== undefined && !SERVER_MODES.some((m) => m === mode.value)) {
    findings.push({
      rule: "env.mode",
      message: `${MODE_ENV}="${mode.value}" is not one of ${SERVER_MODES.join(", ")}`,
    });
  }
}

function checkProbes(container: Container, containerPort: number | null, findings: Finding[]): void {
  const probes = [
    { kind: "readinessProbe", probe: container.readinessProbe, path: READINESS_PATH },
    { kind: "livenessProbe", probe: container.livenessProbe, path: LIVENESS_PATH },
  ] as const;

  for (const { kind, probe, path } of probes) {
    const http = probe?.httpGet;
    if (!http) {
      findings.push({ rule: "probe.missing", message: `${kind} with httpGet is missing` });
      continue;
    }
    if (http.path !== path) {
      findings.push({
        rule: "probe.path",
        message: `${kind} polls ${http.path}; the service serves ${path}`,
      });
    }
    const port =
      typeof http.port === "number"
        ? http.port
        : container.ports?.find((p) => p.name === http.port)?.containerPort ?? null;
    if (port === null || port !== containerPort) {
      findings.push({
        rule: "probe.port",
        message: `${kind} targets port ${String(http.port)}; container port is ${String(containerPort)}`,
      });
    }
  }
}

function checkResources(container: Container, findings: Finding[]): void {
  const { limits, requests } = container.resources ?? {};
  const pairs = [
    { name: "cpu", parse: parseCpu, limit: limits?.cpu, request: requests?.cpu },
    { name: "memory", parse: parseMemory, limit: limits?.memory, request: requests?.memory },
  ];

  for (const { name, parse, limit, request } of pairs) {
    if (limit === undefined || request === undefined) continue;
    let l: number;
    let r: number;
    try {
      l = parse(limit);
      r = parse(request);
    } catch (err) {
      findings.push({
        rule: "resources.quantity",
        message: err instanceof Error ? err.message : String(err),
      });
      continue;
    }
    if (r > l) {
      findings.push({
        rule: "resources.request",
        message: `${name} request ${String(request)} exceeds limit ${String(limit)}`,
      });
    }
  }
}

export function lintDeployment(input: LintInput): Finding[] {
  const findings: Finding[] = [];

  const parsed = parseDeployment(input.manifest);
  if (!parsed.ok) {
    return parsed.errors.map((message) => ({ rule: "manifest.schema", message }));
  }

  let docker: DockerfileInfo;
  try {
    docker = parseDockerfile(input.dockerfile);
  } catch (err) {
    findings.push({
      rule: "dockerfile.syntax",
      message: err instanceof Error ? err.message : String(err),
    });
    return findings;
  }

  const containers = parsed.deployment.spec.template.spec.containers;
  if (containers.length !== 1) {
    findings.push({
      rule: "manifest.containers",
      message: `expected exactly one container, found ${containers.length}`,
    });
  }
  const container = containers[0];
  const env = container.env ?? [];

  const containerPort = container.ports?.[0]?.containerPort ?? null;
  if (containerPort === null) {
    findings.push({ rule: "port.container", message: "container declares no containerPort" });
  } else {
    if (!docker.exposedPorts.includes(containerPort)) {
      findings.push({
        rule: "port.expose",
        message: `Dockerfile EXPOSE ${docker.exposedPorts.join(" ") || "(none)"} does not include containerPort ${containerPort}`,
      });
    }

    const bound = cmdPort(docker.cmd) ?? numberOrNull(docker.env[PORT_ENV]);
    if (bound !== containerPort) {
      findings.push({
        rule: "port.cmd",
        message: `image binds port ${String(bound)}; containerPort is ${containerPort}`,
      });
    }

    const literal = env.find((e) => e.name === PORT_ENV)?.value;
    if (literal === undefined) {
      findings.push({ rule: "port.env", message: `${PORT_ENV} is not set as a literal` });
    } else if (Number(literal) !== containerPort) {
      findings.push({
        rule: "port.env",
        message: `${PORT_ENV}=${literal} does not match containerPort ${containerPort}`,
      });
    }
  }

  checkEnv(env, findings);
  checkProbes(container, containerPort, findings);
  checkResources(container, findings);

  return findings;
}

function numberOrNull(v: string | undefined): number | null {
  if (v === undefined || !/^\d+$/.test(v)) return null;
  return Number(v);
}
