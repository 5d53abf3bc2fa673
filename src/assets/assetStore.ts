import { promises as fs } from "fs";
import path from "path";
import { Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import { pathToFileURL } from "url";
import { errorMessage, RebuildError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { encodedTargetPath, type Target } from "../core/target.js";
import { PathLocks } from "../core/locks.js";

export type AssetType =
  | "rebuild"
  | "upstream"
  | "logs"
  | "info.json"
  | "Dockerfile"
  | "build.yaml"
  | "diff"
  | `debug/${string}`;

export interface Asset {
  target: Target;
  type: AssetType;
}

export class AssetNotFoundError extends RebuildError {
  constructor(readonly asset: Asset) {
    super("NotFound", `asset not found: ${assetName(asset)} [target=${encodedTargetPath(asset.target).join("/")}]`);
    this.name = "AssetNotFoundError";
  }
}

/** Any filesystem failure other than a missing asset; reported with kind `IO`. */
export class AssetIOError extends RebuildError {
  readonly reportedKind = "IO";

  constructor(message: string, cause?: unknown) {
    super("Internal", message, { cause });
    this.name = "AssetIOError";
  }
}

/** File name of the asset: the artifact's own name for the rebuilt artifact. */
export function assetName(asset: Asset): string {
  return asset.type === "rebuild" ? asset.target.artifact : asset.type;
}

export interface AssetStore {
  readonly runId: RunId;
  reader(asset: Asset): Promise<Readable>;
  /** Creates or replaces the asset once the stream finishes. */
  writer(asset: Asset): Promise<Writable>;
  read(asset: Asset): Promise<Uint8Array>;
  write(asset: Asset, data: Uint8Array | string): Promise<void>;
  exists(asset: Asset): Promise<boolean>;
  url(asset: Asset): string;
}

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

let tmpCounter = 0;

/**
 * Assets of one run on the local filesystem:
 * `<root>/assets/<run_id>/<eco>/<pkg>/<ver>/<artifact>/<type>`.
 * Writes go through a temp file and a rename; concurrent writers of one path are serialized.
 */
export class LocalAssetStore implements AssetStore {
  private readonly locks = new PathLocks();

  constructor(
    private readonly rootDir: string,
    readonly runId: RunId
  ) {}

  assetPath(asset: Asset): string {
    const parts = encodedTargetPath(asset.target);
    return path.resolve(this.rootDir, "assets", this.runId, ...parts, ...assetName(asset).split("/"));
  }

  url(asset: Asset): string {
    return pathToFileURL(this.assetPath(asset)).href;
  }

  async exists(asset: Asset): Promise<boolean> {
    try {
      return (await fs.stat(this.assetPath(asset))).isFile();
    } catch (e) {
      if (isMissing(e)) return false;
      throw new AssetIOError(`stat ${this.assetPath(asset)}: ${errorMessage(e)}`, e);
    }
  }

  async reader(asset: Asset): Promise<Readable> {
    try {
      const handle = await fs.open(this.assetPath(asset), "r");
      return handle.createReadStream();
    } catch (e) {
      if (isMissing(e)) throw new AssetNotFoundError(asset);
      throw new AssetIOError(`opening ${this.assetPath(asset)}: ${errorMessage(e)}`, e);
    }
  }

  async read(asset: Asset): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(this.assetPath(asset)));
    } catch (e) {
      if (isMissing(e)) throw new AssetNotFoundError(asset);
      throw new AssetIOError(`reading ${this.assetPath(asset)}: ${errorMessage(e)}`, e);
    }
  }

  async write(asset: Asset, data: Uint8Array | string): Promise<void> {
    await pipeline(Readable.from([typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data)]), await this.writer(asset));
  }

  async writer(asset: Asset): Promise<Writable> {
    const dest = this.assetPath(asset);
    const release = await this.locks.acquire(dest);
    const tmp = `${dest}.${process.pid}.${tmpCounter++}.tmp`;
    let handle: fs.FileHandle;
    try {
      await fs.mkdir(path.dirname(dest), { recursive: true });
      handle = await fs.open(tmp, "w");
    } catch (e) {
      release();
      throw new AssetIOError(`creating ${dest}: ${errorMessage(e)}`, e);
    }
    let settled = false;
    const finish = () => {
      if (!settled) {
        settled = true;
        release();
      }
    };
    return new Writable({
      write(chunk: Buffer, _enc, cb) {
        handle.write(chunk).then(
          () => cb(),
          (e: unknown) => cb(new AssetIOError(`writing ${dest}: ${errorMessage(e)}`, e))
        );
      },
      final(cb) {
        handle
          .close()
          .then(() => fs.rename(tmp, dest))
          .then(
            () => {
              finish();
              cb();
            },
            (e: unknown) => {
              finish();
              cb(new AssetIOError(`committing ${dest}: ${errorMessage(e)}`, e));
            }
          );
      },
      destroy(err, cb) {
        if (settled) {
          cb(err);
          return;
        }
        handle
          .close()
          .catch((e: unknown) => console.error(`closing ${tmp}: ${errorMessage(e)}`))
          .then(() => fs.rm(tmp, { force: true }))
          .then(
            () => {
              finish();
              cb(err);
            },
            (e: unknown) => {
              finish();
              cb(err ?? new AssetIOError(`removing ${tmp}: ${errorMessage(e)}`, e));
            }
          );
      }
    });
  }
}

/** Copies one asset between stores, streaming. */
export async function copyAsset(from: AssetStore, to: AssetStore, asset: Asset): Promise<void> {
  await pipeline(await from.reader(asset), await to.writer(asset));
}
