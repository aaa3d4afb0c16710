/**
 * JSON artifact writer
 * One file per workout under the athlete's workouts/ directory
 */

import { rm } from "fs/promises";
import { basename, join } from "path";
import fg from "fast-glob";
import type { Artifact, ArtifactWriter, WorkItemId } from "./types";
import { PermanentError, fileExists, writeAtomic } from "./utils";

export class JsonArtifactWriter implements ArtifactWriter {
  constructor(readonly directory: string) {}

  async write(id: WorkItemId, artifact: Artifact): Promise<string> {
    // File names come from the source; never let one escape the directory
    const fileName = basename(artifact.fileName);
    if (!fileName.includes(`_wid${id}.`)) {
      throw new PermanentError(`Artifact name ${artifact.fileName} does not belong to workout ${id}`);
    }

    const filepath = join(this.directory, fileName);
    await writeAtomic(filepath, artifact.content);
    return filepath;
  }

  async discard(ids?: readonly WorkItemId[]): Promise<number> {
    if (!(await fileExists(this.directory))) {
      return 0;
    }

    const patterns = ids ? ids.map((id) => `*_wid${id}.json`) : ["*_wid*.json"];
    if (patterns.length === 0) {
      return 0;
    }

    const files = await fg(patterns, { cwd: this.directory, absolute: true, onlyFiles: true });
    await Promise.all(files.map((file) => rm(file, { force: true })));
    return files.length;
  }
}
