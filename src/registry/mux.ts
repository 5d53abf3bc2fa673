import type { Ecosystem } from "../core/target.js";
import { HttpCratesRegistry, type CratesRegistry } from "./cratesio.js";
import { HttpDebianRegistry, type DebianRegistry } from "./debian.js";
import { HttpGoProxy, type GoProxy } from "./goproxy.js";
import { HttpClient, type FetchFn } from "./http.js";
import { HttpMavenRegistry, type MavenRegistry } from "./maven.js";
import { HttpNpmRegistry, type NpmRegistry } from "./npm.js";
import { HttpPypiRegistry, type PypiRegistry } from "./pypi.js";
import { RateLimiters } from "./rateLimit.js";

/** One client per ecosystem, each behind that ecosystem's shared token bucket. */
export interface RegistryMux {
  npm: NpmRegistry;
  pypi: PypiRegistry;
  cratesio: CratesRegistry;
  debian: DebianRegistry;
  maven: MavenRegistry;
  go: GoProxy;
}

export function createRegistryMux(opts: { fetch?: FetchFn; limiters?: RateLimiters } = {}): RegistryMux {
  const limiters = opts.limiters ?? RateLimiters.unlimited();
  const http = (eco: Ecosystem) => new HttpClient({ fetch: opts.fetch, limiter: limiters.for(eco) });
  return {
    npm: new HttpNpmRegistry(http("npm")),
    pypi: new HttpPypiRegistry(http("pypi")),
    cratesio: new HttpCratesRegistry(http("cratesio")),
    debian: new HttpDebianRegistry(http("debian")),
    maven: new HttpMavenRegistry(http("maven")),
    go: new HttpGoProxy(http("go"))
  };
}
