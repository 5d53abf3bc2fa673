import type { Target } from "../core/target.js";
import { parseComponent } from "../registry/debian.js";
import type { RegistryMux } from "../registry/mux.js";

/** Downloads the artifact the registry serves for `t`. */
export async function fetchUpstream(registries: RegistryMux, t: Target, signal?: AbortSignal): Promise<Uint8Array> {
  switch (t.ecosystem) {
    case "npm":
      return registries.npm.artifact(t.package, t.version, signal);
    case "pypi":
      return registries.pypi.artifact(t.package, t.version, t.artifact, signal);
    case "cratesio":
      return registries.cratesio.artifact(t.package, t.version, signal);
    case "debian": {
      const { component, name } = parseComponent(t.package);
      return registries.debian.artifact(component, name, t.artifact, signal);
    }
    case "maven":
      return registries.maven.releaseFile(t.package, t.version, t.artifact, signal);
    case "go":
      return registries.go.zip(t.package, t.version, signal);
  }
}
