import fs from "fs";
import path from "path";

export function ensureDirExistsFor(file: string) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
}

/** Writes beside the destination, then renames over it: readers see the old or the new file, never half of one. */
export function writeFileAtomic(file: string, data: string) {
  ensureDirExistsFor(file);
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`;
  try {
    fs.writeFileSync(tmp, data, "utf8");
    fs.renameSync(tmp, file);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
}

export type JsonReadResult =
  | { kind: "missing" }
  | { kind: "unreadable"; error: Error }
  | { kind: "invalid"; error: Error }
  | { kind: "ok"; value: unknown };

export function readJsonFile(file: string): JsonReadResult {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return { kind: "missing" };
    return { kind: "unreadable", error: toError(error) };
  }
  try {
    return { kind: "ok", value: JSON.parse(raw) };
  } catch (error) {
    return { kind: "invalid", error: toError(error) };
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
