import fs from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import { ResultAsync, errAsync } from 'neverthrow';
import type { ParseFailedError } from '../../core/errors/app-error.js';
import { Err } from '../../core/errors/factories.js';
import { parseJsonText } from '../../core/errors/boundary-validation.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import { DI } from '../../di/tokens.js';
import { parseTreeDocument } from './tree-document.js';
import type { TreeDefinition, TreeOrigin } from './types.js';

/** Reject files larger than this (bytes) */
const MAX_FILE_SIZE_BYTES = 1_000_000;

export interface DirectoryLoad {
  readonly definitions: readonly TreeDefinition[];
  readonly failures: readonly ParseFailedError[];
}

export interface LoadOptions {
  /** Origin recorded on loaded definitions; defaults to the file path */
  readonly origin?: TreeOrigin;
}

function describeFsError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Loads JSON tree documents from disk.
 *
 * A directory load never fails as a whole: unreadable or invalid files are
 * reported in `failures` (and logged) while the rest load.
 */
@injectable()
export class FileTreeLoader {
  private readonly logger: Logger;

  constructor(@inject(DI.Logging.Factory) loggerFactory: ILoggerFactory) {
    this.logger = loggerFactory.create('FileTreeLoader');
  }

  loadFile(filePath: string, options: LoadOptions = {}): ResultAsync<TreeDefinition, ParseFailedError> {
    const source = path.resolve(filePath);
    const origin: TreeOrigin = options.origin ?? { kind: 'file', path: source };

    return ResultAsync.fromPromise(fs.stat(source), (e) => Err.parseFailed(source, describeFsError(e)))
      .andThen((stats) =>
        stats.size > MAX_FILE_SIZE_BYTES
          ? errAsync(Err.parseFailed(source, `file exceeds ${MAX_FILE_SIZE_BYTES} bytes`))
          : ResultAsync.fromPromise(fs.readFile(source, 'utf-8'), (e) => Err.parseFailed(source, describeFsError(e)))
      )
      .andThen((text) => parseJsonText(text, source))
      .andThen((data) => parseTreeDocument(data, source, origin));
  }

  async loadDirectory(directory: string, options: LoadOptions = {}): Promise<DirectoryLoad> {
    const dir = path.resolve(directory);
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (e) {
      const failure = Err.parseFailed(dir, describeFsError(e));
      this.logger.warn({ directory: dir, err: e }, 'Tree directory could not be read');
      return { definitions: [], failures: [failure] };
    }

    const files = entries.filter((name) => name.endsWith('.json')).sort();
    const definitions: TreeDefinition[] = [];
    const failures: ParseFailedError[] = [];

    for (const name of files) {
      const result = await this.loadFile(path.join(dir, name), options);
      if (result.isOk()) {
        definitions.push(result.value);
      } else {
        this.logger.warn({ source: result.error.source, details: result.error.details }, 'Skipping invalid tree file');
        failures.push(result.error);
      }
    }

    this.logger.debug({ directory: dir, loaded: definitions.length, failed: failures.length }, 'Loaded tree directory');
    return { definitions, failures };
  }
}
