import { readFileSync } from "fs";
import * as z from "zod/v4";
import { dataFilePath } from "../core/dataFile.js";
import { decode } from "./http.js";

export interface NodeRelease {
  version: string;
  date: string;
  /** Whether unofficial-builds.nodejs.org publishes a linux-x64-musl tarball for it. */
  hasMusl: boolean;
}

const releasesSchema = z.array(
  z.object({
    version: z.string(),
    date: z.string(),
    hasMusl: z.boolean()
  })
);

let cached: readonly NodeRelease[] | null = null;

/** Unofficial Node.js releases, newest first. */
export function unofficialNodeReleases(): readonly NodeRelease[] {
  if (!cached) {
    const file = dataFilePath("nodeReleases.json");
    const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
    cached = decode(releasesSchema, raw, file);
  }
  return cached;
}
