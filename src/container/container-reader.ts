import * as CFB from 'cfb';
import type { CFB$Container, CFB$Entry } from 'cfb';
import { TextDecoder } from 'util';
import { MalformedContainerError, errorMessage } from '../errors';

/** cfb entry type for streams/files, as opposed to storages and the root. */
const STREAM_ENTRY = 2;

const utf8 = new TextDecoder('utf-8');

export type ContainerKind = 'zip' | 'cfb';

/**
 * Named-entry view over a zip archive (OOXML, ODS) or a compound file
 * (legacy binary). Entry bytes are never modified, so any number of
 * readers can share one view.
 */
export class EntryContainer {
  private readonly entries = new Map<string, CFB$Entry>();
  private readonly folded = new Map<string, string>();

  private constructor(readonly kind: ContainerKind, container: CFB$Container) {
    const root = container.FullPaths[0] ?? '';
    container.FileIndex.forEach((entry, index) => {
      if (entry.type !== STREAM_ENTRY) return;
      const fullPath = container.FullPaths[index] ?? entry.name;
      const name = (fullPath.startsWith(root) ? fullPath.slice(root.length) : fullPath).replace(/^\/+/, '');
      if (name === '' || name.startsWith('\u0001Sh33tJ5')) return;
      this.entries.set(name, entry);
      this.folded.set(name.toLowerCase(), name);
    });
  }

  static open(bytes: Uint8Array, kind: ContainerKind): EntryContainer {
    let container: CFB$Container;
    try {
      container = CFB.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), { type: 'buffer' });
    } catch (error) {
      const what = kind === 'zip' ? 'zip archive' : 'compound file';
      throw new MalformedContainerError(`Unreadable ${what}: ${errorMessage(error)}`, { cause: error });
    }
    return new EntryContainer(kind, container);
  }

  listEntries(): string[] {
    return [...this.entries.keys()];
  }

  hasEntry(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  readEntry(name: string): Uint8Array {
    const bytes = this.tryReadEntry(name);
    if (bytes === null) {
      throw new MalformedContainerError(`Missing entry "${name}"`);
    }
    return bytes;
  }

  tryReadEntry(name: string): Uint8Array | null {
    const entry = this.lookup(name);
    if (!entry) return null;
    const content = entry.content;
    const bytes = content instanceof Uint8Array ? content : Uint8Array.from(content);
    return bytes.length > entry.size ? bytes.subarray(0, entry.size) : bytes;
  }

  readText(name: string): string | null {
    const bytes = this.tryReadEntry(name);
    return bytes === null ? null : utf8.decode(bytes);
  }

  private lookup(name: string): CFB$Entry | undefined {
    const key = name.replace(/^\/+/, '');
    return this.entries.get(key) ?? this.entries.get(this.folded.get(key.toLowerCase()) ?? '');
  }
}

/** Resolves a part name relative to the part that references it, OPC style. */
export function resolvePartPath(base: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  const segments = base.split('/').slice(0, -1);
  for (const segment of target.split('/')) {
    if (segment === '..') segments.pop();
    else if (segment !== '.' && segment !== '') segments.push(segment);
  }
  return segments.join('/');
}
