// backend/tools/deploy-lint/cli.ts
/**
 * Checks kubernetes/deployment.yaml against the Dockerfile and the service.
 *
 * Usage:
 *   tsx backend/tools/deploy-lint/index.ts [deployment.yaml] [Dockerfile]
 *
 * Exits 1 when any finding is reported.
 */
import * as fs from "fs";
import * as path from "path";
import { lintDeployment } from "./lint";

const REPO_ROOT = path.resolve(__dirname, "../../..");

export const DEFAULT_MANIFEST = path.join(REPO_ROOT, "kubernetes", "deployment.yaml");
export const DEFAULT_DOCKERFILE = path.join(REPO_ROOT, "Dockerfile");

export function main(argv: string[]): number {
  const [manifestPath = DEFAULT_MANIFEST, dockerfilePath = DEFAULT_DOCKERFILE] = argv;

  for (const p of [manifestPath, dockerfilePath]) {
    if (!fs.existsSync(p)) {
      console.error(`✖ not found: ${p}`);
      return 1;
    }
  }

  const findings = lintDeployment({
    manifest: fs.readFileSync(manifestPath, "utf8"),
    dockerfile: fs.readFileSync(dockerfilePath, "utf8"),
  });

  for (const f of findings) {
    console.error(`✖ [${f.rule}] ${f.message}`);
  }
  if (findings.length) {
    console.error(`${findings.length} problem(s) in ${path.relative(process.cwd(), manifestPath)}`);
    return 1;
  }
  console.log(`✔ ${path.relative(process.cwd(), manifestPath)} matches the image and service`);
  return 0;
}
