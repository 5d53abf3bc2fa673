import type { Target } from "../core/target.js";
import { basicSourceSetup, cdPrefix } from "./source.js";
import type { BuildEnv, Instructions, MavenBuild } from "./types.js";
import { joinPosix } from "./workflow.js";

export function temurinJdkUrl(jdkVersion: string): string {
  return `https://api.adoptium.net/v3/binary/latest/${jdkVersion}/ga/linux/x64/jdk/hotspot/normal/eclipse`;
}

export function renderMavenBuild(s: MavenBuild, t: Target, env: BuildEnv): Instructions {
  return {
    location: s.location,
    systemDeps: ["git", "wget", "maven"],
    source: basicSourceSetup(s.location, env),
    deps: ["mkdir -p /opt/jdk", `wget -O - ${temurinJdkUrl(s.jdkVersion)} | tar xzf - --strip-components=1 -C /opt/jdk`].join("\n"),
    build: `${cdPrefix(s.location.dir)}JAVA_HOME=/opt/jdk PATH=/opt/jdk/bin:$PATH mvn -B package -DskipTests`,
    outputPath: joinPosix(s.location.dir, "target", t.artifact)
  };
}
