// backend/tools/deploy-lint/quantity.ts

/**
 * Kubernetes resource quantities, reduced to comparable numbers.
 * CPU → cores ("100m" = 0.1); memory → bytes ("256Mi" = 268435456).
 */

const BINARY: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
};

const DECIMAL: Record<string, number> = {
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
};

const QUANTITY_RE = /^(\d+(?:\.\d+)?)([A-Za-z]{0,2})$/;

export function parseCpu(q: string | number): number {
  if (typeof q === "number") return q;
  const m = QUANTITY_RE.exec(q.trim());
  if (!m) throw new Error(`Invalid CPU quantity "${q}"`);
  const n = Number(m[1]);
  if (m[2] === "") return n;
  if (m[2] === "m") return n / 1000;
  throw new Error(`Invalid CPU quantity "${q}"`);
}

export function parseMemory(q: string | number): number {
  if (typeof q === "number") return q;
  const m = QUANTITY_RE.exec(q.trim());
  if (!m) throw new Error(`Invalid memory quantity "${q}"`);
  const n = Number(m[1]);
  const suffix = m[2];
  if (suffix === "") return n;
  const factor = BINARY[suffix] ?? DECIMAL[suffix];
  if (factor === undefined) throw new Error(`Invalid memory quantity "${q}"`);
  return n * factor;
}
