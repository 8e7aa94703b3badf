import fse from "fs-extra";

// =============================================================================
// TIME
// =============================================================================

/** UTC timestamp with second precision, e.g. 2024-05-01T10:00:00Z. */
export function isoNow(now: Date = new Date()): string {
  return toSecondPrecision(now);
}

export function toSecondPrecision(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function compareTimestamps(a: string, b: string): number {
  return Date.parse(a) - Date.parse(b);
}

export function sleep(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}

// =============================================================================
// FILES
// =============================================================================

/**
 * Write-temp-then-rename. The temp file lives beside the target so the rename
 * stays on one filesystem and replaces the target in a single step.
 */
let tempCounter = 0;

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  tempCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${tempCounter}.tmp`;
  await fse.outputFile(tempPath, content, "utf8");
  try {
    // rename(2) swaps the target in place; the old file stays readable until then.
    await fse.rename(tempPath, filePath);
  } catch (err) {
    await fse.remove(tempPath);
    throw err;
  }
}

export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
