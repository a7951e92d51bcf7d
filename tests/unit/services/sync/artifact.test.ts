import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ArtifactError } from "../../../../src/errors.js";
import {
  readArtifact,
  removeArtifact,
  writeArtifact,
} from "../../../../src/services/sync/artifact.js";

describe("artifact", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "license-sync-artifact-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write a pretty-printed JSON array and read it back", async () => {
    const path = join(dir, "nested", "export.json");

    await writeArtifact(path, [{ licenseId: "L-1" }]);

    expect(await readFile(path, "utf8")).toBe(
      '[\n  {\n    "licenseId": "L-1"\n  }\n]\n'
    );
    expect(await readArtifact(path)).toEqual([{ licenseId: "L-1" }]);
    expect(await readdir(join(dir, "nested"))).toEqual(["export.json"]);
  });

  it("should report a missing artifact", async () => {
    const path = join(dir, "missing.json");

    await expect(readArtifact(path)).rejects.toThrow(
      "Artifact not found; the export stage did not produce it"
    );
    await expect(readArtifact(path)).rejects.toBeInstanceOf(ArtifactError);
  });

  it("should reject invalid JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "[{", "utf8");

    await expect(readArtifact(path)).rejects.toThrow(/^Artifact is not valid JSON: /);
  });

  it("should reject JSON that is not an array", async () => {
    const path = join(dir, "object.json");
    await writeFile(path, '{"licenseId":"L-1"}', "utf8");

    await expect(readArtifact(path)).rejects.toThrow("Artifact is not a JSON array");
  });

  it("should remove an artifact and ignore one that is already gone", async () => {
    const path = join(dir, "export.json");
    await writeArtifact(path, []);

    await removeArtifact(path);
    await removeArtifact(path);

    expect(await readdir(dir)).toEqual([]);
  });
});
