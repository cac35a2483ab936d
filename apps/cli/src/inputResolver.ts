import { readFile } from 'node:fs/promises';
import process from 'node:process';
import { Readable } from 'node:stream';

export type TextSource =
  | { kind: 'inline'; value: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

export interface InputMetadata {
  source: TextSource['kind'];
  filePath?: string;
  bytes: number;
}

export interface ResolvedInput {
  text: string;
  metadata: InputMetadata;
}

export interface InputResolverDependencies {
  stdinFactory?: () => Readable;
  readFileImpl?: (path: string, encoding: BufferEncoding) => Promise<string>;
}

export class InputResolveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputResolveError';
  }
}

export class InputResolver {
  private readonly stdinFactory: () => Readable;

  private readonly readFileImpl: (path: string, encoding: BufferEncoding) => Promise<string>;

  constructor(deps: InputResolverDependencies = {}) {
    this.stdinFactory = deps.stdinFactory ?? (() => process.stdin);
    this.readFileImpl = deps.readFileImpl ?? ((path, encoding) => readFile(path, { encoding }));
  }

  async resolve(source: TextSource): Promise<ResolvedInput> {
    switch (source.kind) {
      case 'inline':
        return this.resolveInline(source.value);
      case 'file':
        return this.resolveFile(source.path);
      case 'stdin':
        return this.resolveStdin();
      default: {
        const unsupported: never = source;
        throw new InputResolveError(`Unsupported text source: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  private resolveInline(text: string): ResolvedInput {
    return {
      text,
      metadata: {
        source: 'inline',
        bytes: Buffer.byteLength(text, 'utf-8'),
      },
    };
  }

  private async resolveFile(path: string): Promise<ResolvedInput> {
    if (!path) {
      throw new InputResolveError('No file path was given');
    }

    let text: string;
    try {
      text = await this.readFileImpl(path, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InputResolveError(`Could not read prompt file ${path}: ${message}`);
    }

    return {
      text,
      metadata: {
        source: 'file',
        filePath: path,
        bytes: Buffer.byteLength(text, 'utf-8'),
      },
    };
  }

  private async resolveStdin(): Promise<ResolvedInput> {
    const stream = this.stdinFactory();

    const chunks: Buffer[] = [];

    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    if (chunks.length === 0) {
      throw new InputResolveError('stdin provided no data');
    }

    const text = Buffer.concat(chunks).toString('utf-8').trim();

    return {
      text,
      metadata: {
        source: 'stdin',
        bytes: Buffer.byteLength(text, 'utf-8'),
      },
    };
  }
}
