import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { PlanWriteError } from "../errors";
import type { PlanFile } from "../render/plan-files";

export interface PlanFileSystem {
  writeFile(path: string, content: string): Promise<void>;
  remove(path: string): Promise<void>;
}

const nodeFileSystem: PlanFileSystem = {
  writeFile: (path, content) => writeFile(path, content, "utf-8"),
  remove: (path) => rm(path, { force: true }),
};

/**
 * Write every plan file into `outputDir`. If any write fails, every file of
 * the plan is removed again and a PlanWriteError names the first failure.
 */
export async function writePlanFiles(
  outputDir: string,
  files: readonly PlanFile[],
  fileSystem: PlanFileSystem = nodeFileSystem,
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const paths = files.map((f) => join(outputDir, f.fileName));

  const results = await Promise.allSettled(files.map((f, i) => fileSystem.writeFile(paths[i], f.content)));
  const failedAt = results.findIndex((r) => r.status === "rejected");
  if (failedAt === -1) return paths;

  // A failed write may still have left a truncated file
  await Promise.all(paths.map((p) => fileSystem.remove(p)));
  const failure = results[failedAt];
  throw new PlanWriteError(files[failedAt].fileName, failure.status === "rejected" ? failure.reason : undefined);
}
