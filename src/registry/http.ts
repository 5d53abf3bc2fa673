import * as z from "zod/v4";
import { errorMessage, malformed, notFound, RebuildError, transient } from "../core/errors.js";
import { cancelled, type TokenBucket } from "./rateLimit.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const USER_AGENT = "rebuild-orchestrator/0.3";

function describeIssues(err: z.ZodError): string {
  return err.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

/**
 * Registry HTTP access shared by every ecosystem client.
 * 404/410 map to NotFound, 429/5xx and network failures to Transient, everything else to Malformed.
 */
export class HttpClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly deps: {
      fetch?: FetchFn;
      limiter?: TokenBucket | null;
      userAgent?: string;
    } = {}
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  async get(url: string, signal?: AbortSignal): Promise<Response> {
    if (this.deps.limiter) await this.deps.limiter.wait(signal);
    if (signal?.aborted) throw cancelled();

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        signal,
        headers: { "user-agent": this.deps.userAgent ?? USER_AGENT }
      });
    } catch (e) {
      if (signal?.aborted) throw cancelled();
      throw transient(`request failed [url=${url}]: ${e instanceof Error ? e.message : String(e)}`, e);
    }

    if (res.ok) return res;
    // Release the connection; the body of an error response is never read.
    await res.body?.cancel().catch((e: unknown) => console.error(`discarding response body failed [url=${url}]: ${errorMessage(e)}`));
    if (res.status === 404 || res.status === 410) throw notFound(`not found [url=${url},status=${res.status}]`);
    if (res.status === 429 || res.status >= 500) throw transient(`registry unavailable [url=${url},status=${res.status}]`);
    throw malformed(`unexpected status [url=${url},status=${res.status}]`);
  }

  async bytes(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const res = await this.get(url, signal);
    try {
      return new Uint8Array(await res.arrayBuffer());
    } catch (e) {
      throw transient(`reading body failed [url=${url}]`, e);
    }
  }

  async text(url: string, signal?: AbortSignal): Promise<string> {
    return new TextDecoder().decode(await this.bytes(url, signal));
  }

  async json<S extends z.ZodType>(url: string, schema: S, signal?: AbortSignal): Promise<z.infer<S>> {
    const body = await this.text(url, signal);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (e) {
      throw malformed(`invalid JSON [url=${url}]`, e);
    }
    return decode(schema, raw, url);
  }
}

export function decode<S extends z.ZodType>(schema: S, raw: unknown, source: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RebuildError("Malformed", `unexpected response shape [source=${source}]: ${describeIssues(parsed.error)}`, {
      cause: parsed.error
    });
  }
  return parsed.data;
}
