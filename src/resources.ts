import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { ResourceHandle, ResourceKind } from "./types.ts";

const EXTENSIONS: Record<ResourceKind, string> = {
  svg: ".svg",
  png: ".png",
  json: ".json",
  text: ".txt",
};

const IMAGE_KINDS: ReadonlySet<ResourceKind> = new Set(["svg", "png"]);

export class ResourceManager {
  readonly root: string;

  constructor(outputDir: string, private logger: Logger) {
    this.root = path.resolve(process.cwd(), outputDir);
  }

  async store(kind: ResourceKind, payload: string | Uint8Array, label: string = kind): Promise<ResourceHandle> {
    await fs.mkdir(this.root, { recursive: true });
    const data = typeof payload === "string" ? Buffer.from(payload, "utf8") : Buffer.from(payload);
    const digest = createHash("sha256").update(data).digest("hex").slice(0, 8);
    const createdAt = new Date();
    const base = `${sanitizeLabel(label)}_${formatStamp(createdAt)}_${digest}`;
    for (let attempt = 1; ; attempt++) {
      const id = `${base}${attempt > 1 ? `-${attempt}` : ""}${EXTENSIONS[kind]}`;
      const abs = path.join(this.root, id);
      try {
        await fs.writeFile(abs, data, { flag: "wx" });
      } catch (err) {
        if (isErrnoCode(err, "EEXIST")) continue;
        throw err;
      }
      await this.logger.json({ type: "resource_stored", id, kind, bytes: data.length });
      return { id, kind, path: abs, createdAt };
    }
  }

  async read(handle: ResourceHandle | string): Promise<Buffer> {
    const id = typeof handle === "string" ? handle : handle.id;
    return fs.readFile(this.resolve(id));
  }

  async list(kinds?: readonly ResourceKind[]): Promise<ResourceHandle[]> {
    const entries = await this.readEntries();
    const handles: ResourceHandle[] = [];
    for (const entry of entries) {
      const kind = kindOf(entry);
      if (!kind || (kinds && !kinds.includes(kind))) continue;
      const abs = path.join(this.root, entry);
      const stat = await fs.stat(abs);
      if (!stat.isFile()) continue;
      handles.push({ id: entry, kind, path: abs, createdAt: stat.mtime });
    }
    return handles.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));
  }

  async listImages(): Promise<ResourceHandle[]> {
    return this.list([...IMAGE_KINDS]);
  }

  /** Best-effort: returns how many resources were removed; failures are only logged. */
  async cleanup(olderThanMs: number, kinds?: readonly ResourceKind[]): Promise<number> {
    let handles: ResourceHandle[];
    try {
      handles = await this.list(kinds);
    } catch (err) {
      this.warn(`cleanup could not list ${this.root}: ${errorMessage(err)}`);
      return 0;
    }
    const cutoff = Date.now() - olderThanMs;
    let removed = 0;
    for (const handle of handles) {
      if (handle.createdAt.getTime() > cutoff) continue;
      try {
        await fs.rm(handle.path);
        removed++;
      } catch (err) {
        this.warn(`cleanup could not remove ${handle.id}: ${errorMessage(err)}`);
      }
    }
    await this.logger.json({ type: "resource_cleanup", olderThanMs, removed });
    return removed;
  }

  resolve(id: string): string {
    if (!id || id !== path.basename(id) || id === "." || id === "..") {
      throw new Error(`Invalid resource id: ${id}`);
    }
    return path.join(this.root, id);
  }

  private async readEntries(): Promise<string[]> {
    try {
      return await fs.readdir(this.root);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  private warn(body: string) {
    this.logger.human({ title: "resources", body, variant: "warn" });
  }
}

function kindOf(file: string): ResourceKind | undefined {
  const ext = path.extname(file);
  const match = Object.entries(EXTENSIONS).find(([, e]) => e === ext);
  return match ? toKind(match[0]) : undefined;
}

function toKind(raw: string): ResourceKind | undefined {
  return raw === "svg" || raw === "png" || raw === "json" || raw === "text" ? raw : undefined;
}

function sanitizeLabel(label: string) {
  return label.replace(/[^a-zA-Z0-9_-]+/g, "_").slice(0, 40) || "resource";
}

function formatStamp(date: Date) {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function isErrnoCode(err: unknown, code: string) {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
