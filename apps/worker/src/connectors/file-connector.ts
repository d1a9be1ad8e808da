import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, isAbsolute, join, relative, resolve } from "node:path";
import { ValidationError } from "@ragsync/errors";
import type { ISourceConnector, JobMeta, SourceItem } from "@ragsync/types";

export interface FileConnectorOptions {
  rootDir: string;
}

/**
 * Reads `sourceQuery.path` (a file or a flat directory) below the root.
 * One file is one source item, keyed by its file name.
 */
export class FileConnector implements ISourceConnector {
  readonly service = "file";
  private readonly rootDir: string;

  constructor(options: FileConnectorOptions) {
    this.rootDir = resolve(options.rootDir);
  }

  async *items(job: JobMeta): AsyncIterable<SourceItem> {
    const target = this.resolvePath(job.sourceQuery["path"]);
    const info = await stat(target);

    const files = info.isDirectory()
      ? (await readdir(target, { withFileTypes: true }))
          .filter((entry) => entry.isFile())
          .map((entry) => join(target, entry.name))
          .sort()
      : [target];

    for (const file of files) {
      yield await this.toItem(file, job.ownerId);
    }
  }

  private resolvePath(path: unknown): string {
    if (typeof path !== "string" || path.length === 0) {
      throw new ValidationError("File task needs a path", { path: "Required" });
    }
    const target = resolve(this.rootDir, path);
    const fromRoot = relative(this.rootDir, target);
    if (fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
      throw new ValidationError("Path is outside the file connector root", { path: "Outside root" });
    }
    return target;
  }

  private async toItem(file: string, ownerId: string): Promise<SourceItem> {
    const [content, info] = await Promise.all([readFile(file), stat(file)]);
    const name = basename(file);
    const ext = extname(name).replace(/^\./, "").toLowerCase();

    return {
      key: { service: "file", userId: ownerId, sourceId: name },
      parts: [
        {
          partKey: "file",
          content: new Uint8Array(content),
          // resolved from the extension by the extractor registry
          mediaType: "application/octet-stream",
          fileName: name,
          metadata: {},
        },
      ],
      metadata: {
        title: name,
        ...(ext ? { ext } : {}),
        lastModified: info.mtime.toISOString(),
      },
    };
  }
}
