import * as CFB from 'cfb';

export type EntryContent = string | Uint8Array;

function pack(entries: Record<string, EntryContent>, fileType: 'zip' | 'cfb'): Uint8Array {
  const container = CFB.utils.cfb_new();
  for (const [name, content] of Object.entries(entries)) {
    CFB.utils.cfb_add(container, name, typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content));
  }
  const written: unknown = CFB.write(container, { type: 'buffer', fileType });
  if (!(written instanceof Uint8Array)) throw new Error('cfb did not return a buffer');
  return new Uint8Array(written);
}

/** Zip archive holding the given entries (OOXML and OpenDocument packages). */
export function packZip(entries: Record<string, EntryContent>): Uint8Array {
  return pack(entries, 'zip');
}

/** Compound file holding the given streams at the root storage. */
export function packCompound(entries: Record<string, EntryContent>): Uint8Array {
  return pack(entries, 'cfb');
}
