import { readFile, stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';

export type TextSource =
  | { kind: 'files'; paths: string[] }
  | { kind: 'stdin'; stream: Readable };

export interface SkippedPath {
  path: string;
  reason: 'missing' | 'not-a-file' | 'unreadable';
}

export interface InputMetadata {
  source: 'files' | 'stdin';
  filePaths: string[];
  skippedPaths: SkippedPath[];
  bytes: number;
}

export interface ResolvedInput {
  text: string;
  metadata: InputMetadata;
}

interface FileStats {
  isFile(): boolean;
}

export interface InputResolverDependencies {
  statImpl?: (path: string) => Promise<FileStats>;
  readFileImpl?: (path: string) => Promise<Uint8Array>;
}

export class InputResolveError extends Error {}

export const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);
export const UNREADABLE_CODES = new Set(['EACCES', 'EPERM']);

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function decodeUtf8(bytes: Uint8Array, origin: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    throw new InputResolveError(`${origin} is not valid UTF-8 text`);
  }
}

export class InputResolver {
  private readonly statImpl: (path: string) => Promise<FileStats>;

  private readonly readFileImpl: (path: string) => Promise<Uint8Array>;

  constructor(deps: InputResolverDependencies = {}) {
    this.statImpl = deps.statImpl ?? ((path) => stat(path));
    this.readFileImpl = deps.readFileImpl ?? ((path) => readFile(path));
  }

  async resolve(source: TextSource): Promise<ResolvedInput> {
    switch (source.kind) {
      case 'files':
        return this.resolveFiles(source.paths);
      case 'stdin':
        return this.resolveStdin(source.stream);
      default: {
        const unsupported: never = source;
        throw new InputResolveError(`Unsupported text source: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  /**
   * Concatenates the files in argument order. Paths that are missing, are not
   * regular files or cannot be read add nothing and are only reported in the
   * metadata.
   */
  private async resolveFiles(paths: string[]): Promise<ResolvedInput> {
    let text = '';
    const filePaths: string[] = [];
    const skippedPaths: SkippedPath[] = [];

    for (const path of paths) {
      const content = await this.readIfFile(path);

      if (typeof content !== 'string') {
        skippedPaths.push({ path, reason: content.reason });
        continue;
      }

      text += content;
      filePaths.push(path);
    }

    return {
      text,
      metadata: {
        source: 'files',
        filePaths,
        skippedPaths,
        bytes: Buffer.byteLength(text, 'utf-8'),
      },
    };
  }

  private async readIfFile(path: string): Promise<string | Pick<SkippedPath, 'reason'>> {
    let bytes: Uint8Array;

    try {
      const stats = await this.statImpl(path);
      if (!stats.isFile()) {
        return { reason: 'not-a-file' };
      }
      bytes = await this.readFileImpl(path);
    } catch (error) {
      const code = errorCode(error);
      if (code && MISSING_CODES.has(code)) {
        return { reason: 'missing' };
      }
      if (code && UNREADABLE_CODES.has(code)) {
        return { reason: 'unreadable' };
      }
      throw error;
    }

    return decodeUtf8(bytes, path);
  }

  private async resolveStdin(stream: Readable): Promise<ResolvedInput> {
    const chunks: Buffer[] = [];

    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    const text = decodeUtf8(Buffer.concat(chunks), 'stdin');

    return {
      text,
      metadata: {
        source: 'stdin',
        filePaths: [],
        skippedPaths: [],
        bytes: Buffer.byteLength(text, 'utf-8'),
      },
    };
  }
}
