import { mkdir, readdir, unlink, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Verdict } from "../types.js";

const CHECK_FILE = /^(\d+)-check\.json$/;
const NS_PER_MS = 1_000_000n;

export function checkFilename(nowMs: number) {
  return `${BigInt(Math.floor(nowMs)) * NS_PER_MS}-check.json`;
}

export function parseCheckFilename(name: string): number | null {
  const match = CHECK_FILE.exec(name);
  if (!match) return null;
  return Number(BigInt(match[1]) / NS_PER_MS);
}

/** Writes one cycle's verdicts as a new file; existing files are never rewritten. */
export async function storeVerdicts(dir: string, verdicts: Verdict[], nowMs = Date.now()) {
  await mkdir(dir, { recursive: true });
  const name = checkFilename(nowMs);
  await writeFile(path.join(dir, name), JSON.stringify(verdicts), { flag: "wx" });
  return name;
}

/** Deletes check files older than the expiry. An expiry of 0 keeps everything. */
export async function maintainStorage(dir: string, checkExpiryMs: number, nowMs = Date.now()) {
  if (checkExpiryMs <= 0) return 0;

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return 0;
    throw error;
  }

  let deleted = 0;
  for (const name of names) {
    const writtenAtMs = parseCheckFilename(name);
    if (writtenAtMs === null || nowMs - writtenAtMs <= checkExpiryMs) continue;
    await unlink(path.join(dir, name));
    deleted += 1;
  }
  return deleted;
}
