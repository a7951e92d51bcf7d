/**
 * Export artifact - the JSON array of license records handed from the
 * export stage to the load stage.
 *
 * Writes go to a temp file in the same directory and are renamed into
 * place, so a reader either sees the whole artifact or none at all.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { ArtifactError, errorMessage } from "../../errors.js";

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export async function writeArtifact(
  path: string,
  records: readonly unknown[]
): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, "utf8");
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new ArtifactError(
      `Failed to write artifact: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }
}

export async function readArtifact(path: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ArtifactError(
      isNotFound(error)
        ? "Artifact not found; the export stage did not produce it"
        : `Failed to read artifact: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ArtifactError(
      `Artifact is not valid JSON: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  if (!Array.isArray(parsed)) {
    throw new ArtifactError("Artifact is not a JSON array", path);
  }
  return parsed;
}

/**
 * Delete the artifact left by a previous cycle; a missing file is fine
 */
export async function removeArtifact(path: string): Promise<void> {
  await rm(path, { force: true });
}
