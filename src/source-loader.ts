import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { SourceRejectedError } from './errors';
import type { ResolvedOpenOptions, SourceInfo } from './types';

export const SPREADSHEET_EXTENSIONS: ReadonlySet<string> = new Set([
  '.xls',
  '.xla',
  '.xlsx',
  '.xlsm',
  '.xlam',
  '.xlsb',
  '.ods',
  '.ots',
]);

export interface LoadedSource {
  bytes: Uint8Array;
  info: SourceInfo;
}

function sha256(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

/**
 * Checks a workbook source before any decoding: the file exists, has a
 * spreadsheet extension and stays under the size limit. Every problem
 * found is reported at once.
 */
export class SourceLoader {
  constructor(private readonly options: ResolvedOpenOptions) {}

  load(source: string | Uint8Array): LoadedSource {
    return typeof source === 'string' ? this.loadFile(source) : this.loadBytes(source);
  }

  private loadBytes(bytes: Uint8Array): LoadedSource {
    if (bytes.length > this.options.maxFileSize) {
      throw new SourceRejectedError([this.tooLarge(bytes.length)]);
    }
    return { bytes, info: { fileSize: bytes.length, hash: sha256(bytes) } };
  }

  private loadFile(filePath: string): LoadedSource {
    const issues: string[] = [];

    if (!fs.existsSync(filePath)) {
      throw new SourceRejectedError(['File does not exist']);
    }
    const stats = fs.statSync(filePath);
    if (!stats.isFile()) {
      throw new SourceRejectedError(['Path is not a regular file']);
    }

    const ext = path.extname(filePath).toLowerCase();
    if (this.options.checkExtension && !SPREADSHEET_EXTENSIONS.has(ext)) {
      issues.push(`Unsupported file extension: ${ext || '(none)'}`);
    }
    if (stats.size > this.options.maxFileSize) {
      issues.push(this.tooLarge(stats.size));
    }
    if (issues.length > 0) throw new SourceRejectedError(issues);

    const buffer = fs.readFileSync(filePath);
    const bytes = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    return { bytes, info: { path: filePath, fileSize: bytes.length, hash: sha256(bytes) } };
  }

  private tooLarge(size: number): string {
    return `File too large: ${size} bytes (max: ${this.options.maxFileSize})`;
  }
}
