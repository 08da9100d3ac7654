import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { PayloadUnavailableError } from "./errors.js";

export interface PayloadSource {
  load(payloadRef: string, signal: AbortSignal): Promise<Buffer>;
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

const errorCode = (err: unknown): string | undefined =>
  err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;

/** Reads payloads stored as files below a single root directory. */
export class FilePayloadSource implements PayloadSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  resolvePath(payloadRef: string): string {
    if (payloadRef.trim().length === 0) {
      throw new PayloadUnavailableError("no payload reference provided", { transient: false });
    }
    const path = resolve(this.root, payloadRef);
    const rel = relative(this.root, path);
    if (rel.length === 0 || rel.startsWith("..") || isAbsolute(rel)) {
      throw new PayloadUnavailableError(`payload reference ${payloadRef} is outside the payload root`, {
        transient: false,
      });
    }
    return path;
  }

  async load(payloadRef: string, signal: AbortSignal): Promise<Buffer> {
    const path = this.resolvePath(payloadRef);
    try {
      return await readFile(path, { signal });
    } catch (err) {
      if (signal.aborted) throw err;
      const code = errorCode(err);
      if (code && MISSING_CODES.has(code)) {
        throw new PayloadUnavailableError(`payload not found: ${payloadRef}`, { transient: false, cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new PayloadUnavailableError(`payload read failed: ${message}`, { transient: true, cause: err });
    }
  }
}
