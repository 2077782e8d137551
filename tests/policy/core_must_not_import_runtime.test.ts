/**
 * Intent: src/core knows nothing of adapters or the runtime layer.
 * Policy Type: Structural / Dependency
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";

const PROJECT_ROOT = process.cwd();
const CORE_ROOT = path.join(PROJECT_ROOT, "src", "core");

function listFilesRecursively(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const p = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listFilesRecursively(p));
    else out.push(p);
  }
  return out;
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

const FORBIDDEN_IMPORTS: Array<{ name: string; re: RegExp }> = [
  { name: "adapter", re: /from\s+["'][./]+adapter(?:\/.*)?["']/g },
  { name: "runtime", re: /from\s+["'](?:\.\.\/)+runtime(?:\/.*)?["']/g },
  { name: "policy", re: /from\s+["'][./]+policy(?:\/.*)?["']/g },
  { name: "@langchain", re: /from\s+["']@langchain\/.*["']/g },
];

test("core must not import adapter, policy or runtime code", () => {
  const files = listFilesRecursively(CORE_ROOT).filter((p) => p.endsWith(".ts"));
  assert.ok(files.length > 0);

  const violations: string[] = [];
  for (const file of files) {
    const text = fs.readFileSync(file, "utf8");
    for (const rule of FORBIDDEN_IMPORTS) {
      for (const match of text.match(rule.re) ?? []) {
        violations.push(`${toPosix(path.relative(PROJECT_ROOT, file))} [${rule.name}] ${match}`);
      }
    }
  }

  assert.deepEqual(violations, []);
});
