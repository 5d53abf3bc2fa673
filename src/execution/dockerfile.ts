import type { Instructions } from "../strategy/types.js";

function indent(script: string): string {
  return script
    .split("\n")
    .map((l) => ` ${l}`)
    .join("\n");
}

/** Package-manager install line for the base image's distribution. */
export function installCommand(baseImage: string, packages: string[]): string {
  if (!packages.length) return "true";
  const pkgs = [...packages].sort().join(" ");
  if (/(^|\/)(debian|ubuntu)[:@]/.test(baseImage)) {
    return `apt-get update && apt-get install -y ${pkgs}`;
  }
  return `apk add --no-cache ${pkgs}`;
}

/**
 * The `Dockerfile` asset: system deps in one layer, source and deps in the next,
 * and the build step as the entrypoint copying the artifact to `/out`.
 */
export function renderDockerfile(instructions: Instructions, baseImage: string): string {
  const lines = [
    "#syntax=docker/dockerfile:1.10",
    `FROM ${baseImage}`,
    "RUN sed 's/^ //' <<'EOF' | sh",
    " set -eux",
    ` ${installCommand(baseImage, instructions.systemDeps)}`,
    "EOF",
    "RUN sed 's/^ //' <<'EOF' | sh",
    " set -eux",
    " mkdir -p /src && cd /src",
    indent(instructions.source),
    indent(instructions.deps),
    "EOF",
    "RUN sed 's/^ //' <<'EOF' >/build",
    " set -eux",
    indent(instructions.build),
    ` chmod 444 /src/${instructions.outputPath}`,
    ` mkdir -p /out && cp /src/${instructions.outputPath} /out/`,
    "EOF",
    'WORKDIR "/src"',
    'ENTRYPOINT ["/bin/sh","/build"]'
  ];
  return `${lines.join("\n")}\n`;
}
