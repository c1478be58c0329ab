/**
 * Writes emission units below an output directory
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, isAbsolute, relative, resolve } from "path";
import type { EmissionUnit, WriteResult } from "./types.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Resolve a unit path inside the output directory
 * @throws FileIOError when the path would land outside it
 */
export function resolveUnitPath(outDir: string, unitPath: string): string {
  const root = resolve(outDir);
  const target = resolve(root, unitPath);
  const rel = relative(root, target);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    throw new FileIOError(`Refusing to write outside the output directory: ${unitPath}`, {
      outDir: root,
    });
  }
  return target;
}

/**
 * Write every unit, creating directories as needed
 * @returns Count and absolute paths of the files written
 */
export async function writeUnits(units: readonly EmissionUnit[], outDir: string): Promise<WriteResult> {
  const paths: string[] = [];

  for (const unit of units) {
    const target = resolveUnitPath(outDir, unit.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, unit.code, "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to write ${unit.path}`, { target }, { cause: error });
    }
    paths.push(target);
    logger.debug("Wrote unit", { path: unit.path });
  }

  logger.info("Wrote generated sources", { destination: resolve(outDir), files: paths.length });

  return {
    written: paths.length,
    destination: resolve(outDir),
    paths,
  };
}
