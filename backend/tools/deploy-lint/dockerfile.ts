// backend/tools/deploy-lint/dockerfile.ts

/**
 * Just enough Dockerfile parsing for the deploy lint: EXPOSE, ENV and CMD of
 * the final stage. Continuation lines and comments are handled; build args
 * and variable substitution are not.
 */

export interface DockerfileInfo {
  exposedPorts: number[];
  env: Record<string, string>;
  /** Exec-form argv, or the shell form split on whitespace. */
  cmd: string[] | null;
}

function logicalLines(text: string): string[] {
  const out: string[] = [];
  let current = "";
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!current && (!line || line.startsWith("#"))) continue;
    if (line.startsWith("#")) continue;
    if (line.endsWith("\\")) {
      current += line.slice(0, -1) + " ";
      continue;
    }
    out.push((current + line).trim());
    current = "";
  }
  if (current.trim()) out.push(current.trim());
  return out;
}

/** Whitespace split that keeps quoted runs together and strips the quotes. */
function tokenize(s: string): string[] {
  const tokens: string[] = [];
  const re = /(?:[^\s"']+|"[^"]*"|'[^']*')+/g;
  for (const m of s.matchAll(re)) {
    tokens.push(m[0].replace(/"([^"]*)"|'([^']*)'/g, "$1$2"));
  }
  return tokens;
}

function parseEnv(args: string, into: Record<string, string>): void {
  const tokens = tokenize(args);
  if (!tokens.length) return;
  if (!tokens[0].includes("=")) {
    // legacy form: ENV KEY value with spaces
    into[tokens[0]] = tokens.slice(1).join(" ");
    return;
  }
  for (const t of tokens) {
    const eq = t.indexOf("=");
    if (eq > 0) into[t.slice(0, eq)] = t.slice(eq + 1);
  }
}

function parseCmd(args: string): string[] {
  if (args.startsWith("[")) {
    const parsed: unknown = JSON.parse(args);
    if (!Array.isArray(parsed) || !parsed.every((a) => typeof a === "string")) {
      throw new Error("CMD exec form must be a JSON array of strings");
    }
    return parsed;
  }
  return tokenize(args);
}

export function parseDockerfile(text: string): DockerfileInfo {
  const info: DockerfileInfo = { exposedPorts: [], env: {}, cmd: null };

  for (const line of logicalLines(text)) {
    const m = /^(\w+)\s+(.*)$/.exec(line);
    if (!m) continue;
    const instr = m[1].toUpperCase();
    const args = m[2].trim();

    switch (instr) {
      case "FROM":
        // new stage: only the final stage's settings reach the image
        info.exposedPorts = [];
        info.env = {};
        info.cmd = null;
        break;
      case "EXPOSE":
        for (const p of args.split(/\s+/)) {
          const port = Number(p.split("/")[0]);
          if (Number.isInteger(port)) info.exposedPorts.push(port);
        }
        break;
      case "ENV":
        parseEnv(args, info.env);
        break;
      case "CMD":
        info.cmd = parseCmd(args);
        break;
    }
  }
  return info;
}

/** Port passed to the server as `--port N` or `--port=N`. */
export function cmdPort(cmd: readonly string[] | null): number | null {
  if (!cmd) return null;
  for (let i = 0; i < cmd.length; i++) {
    const a = cmd[i];
    if (a === "--port" && i + 1 < cmd.length) return Number(cmd[i + 1]);
    if (a.startsWith("--port=")) return Number(a.slice("--port=".length));
  }
  return null;
}
