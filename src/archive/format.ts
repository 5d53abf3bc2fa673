import type { Target } from "../core/target.js";

export type ArchiveFormat = "tar" | "targz" | "zip" | "deb" | "raw";

/** Container format of a target's artifact, from its ecosystem and file extension. */
export function formatForTarget(t: Target): ArchiveFormat {
  const name = t.artifact.toLowerCase();
  switch (t.ecosystem) {
    case "npm":
    case "cratesio":
      return "targz";
    case "go":
      return "zip";
    case "debian":
      return name.endsWith(".deb") ? "deb" : "raw";
    case "maven":
      return name.endsWith(".jar") || name.endsWith(".war") ? "zip" : "raw";
    case "pypi":
      if (name.endsWith(".whl") || name.endsWith(".zip") || name.endsWith(".egg")) return "zip";
      if (name.endsWith(".tar.gz") || name.endsWith(".tgz")) return "targz";
      if (name.endsWith(".tar")) return "tar";
      return "raw";
  }
}
