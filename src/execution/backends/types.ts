export interface ExecutionLimits {
  timeoutSeconds: number;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  startedAt: string;
  finishedAt: string;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Written to the child's stdin, then closed. */
  stdin?: string;
}

export interface DockerMount {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export interface DockerSpec {
  kind: "docker";
  image: string;
  argv: string[];
  workdir?: string;
  containerName?: string;
  network?: "none" | "bridge" | "host";
  env?: Record<string, string>;
  mounts?: DockerMount[];
  user?: string;
}

export type ExecutionSpec = LocalProcessSpec | DockerSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, limits: ExecutionLimits): Promise<ExecutionResult>;
}
