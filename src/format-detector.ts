import { decodeLatin1 } from './container/byte-reader';
import { resolvePartPath } from './container/container-reader';
import type { EntryContainer } from './container/container-reader';
import { MalformedContainerError, StreamFramingError, UnsupportedFormatError } from './errors';
import { parseRelationships } from './decoders/xlsx/relationships';
import type { Relationship } from './decoders/xlsx/relationships';
import type { SpreadsheetFormat } from './types';

/** Largest prefix the detector ever looks at. */
export const SIGNATURE_WINDOW = 512;

export type SignatureKind = 'xls' | 'biff' | 'ods' | 'zip';

const CFB_MAGIC = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];
const ZIP_LOCAL_HEADER = [0x50, 0x4b, 0x03, 0x04];
const ODS_MIMETYPES = new Set([
  'application/vnd.oasis.opendocument.spreadsheet',
  'application/vnd.oasis.opendocument.spreadsheet-template',
]);
export interface ArchiveFormat {
  format: Exclude<SpreadsheetFormat, 'xls'>;
  /** Entry holding the workbook directory (`content.xml` for OpenDocument). */
  workbookPart: string;
}

const OFFICE_DOCUMENT_REL = /\/officeDocument$/;

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  return magic.every((byte, i) => bytes[i] === byte);
}

/**
 * Picks the container family from the first bytes of a file. A zip is
 * reported as `ods` right away when its first entry is the stored
 * OpenDocument `mimetype`; other zips are settled by
 * {@link resolveArchiveFormat} from their entry names.
 */
export function detectFormat(prefix: Uint8Array): SignatureKind {
  const window = prefix.subarray(0, SIGNATURE_WINDOW);
  if (window.length < 8) {
    throw new UnsupportedFormatError(`Signature too short (${window.length} bytes)`);
  }
  if (startsWith(window, CFB_MAGIC)) return 'xls';
  if (startsWith(window, ZIP_LOCAL_HEADER)) return detectZipFlavor(window);

  const recordType = window[0] | (window[1] << 8);
  if (recordType === 0x0809) {
    const version = window[4] | (window[5] << 8);
    if (version === 0x0600 || version === 0x0500) return 'biff';
    throw new UnsupportedFormatError(`Unsupported BIFF version 0x${version.toString(16)}`);
  }
  if (recordType === 0x0009 || recordType === 0x0209 || recordType === 0x0409) {
    throw new UnsupportedFormatError('BIFF2-BIFF4 workbooks are not supported');
  }
  throw new UnsupportedFormatError('Unrecognized file signature');
}

function detectZipFlavor(window: Uint8Array): SignatureKind {
  if (window.length < 30) return 'zip';
  const view = new DataView(window.buffer, window.byteOffset, window.byteLength);
  const method = view.getUint16(8, true);
  const compressedSize = view.getUint32(18, true);
  const nameLength = view.getUint16(26, true);
  const extraLength = view.getUint16(28, true);
  const nameEnd = 30 + nameLength;
  if (nameEnd > window.length) return 'zip';
  if (decodeLatin1(window.subarray(30, nameEnd)) !== 'mimetype' || method !== 0) return 'zip';

  const dataStart = nameEnd + extraLength;
  const dataEnd = dataStart + compressedSize;
  if (dataEnd > window.length) return 'zip';
  const mimetype = decodeLatin1(window.subarray(dataStart, dataEnd)).trim();
  if (ODS_MIMETYPES.has(mimetype)) return 'ods';
  throw new UnsupportedFormatError(`Unsupported OpenDocument type "${mimetype}"`);
}

function packageRelationships(bytes: Uint8Array): Relationship[] {
  try {
    return parseRelationships(bytes);
  } catch (error) {
    if (error instanceof StreamFramingError) {
      throw new MalformedContainerError(`Package relationships are malformed: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/** Settles a zip by its directory: OpenDocument, OOXML with XML parts, or OOXML with binary parts. */
export function resolveArchiveFormat(archive: EntryContainer): ArchiveFormat {
  const mimetype = archive.readText('mimetype');
  if (mimetype !== null) {
    if (ODS_MIMETYPES.has(mimetype.trim())) return { format: 'ods', workbookPart: 'content.xml' };
    throw new UnsupportedFormatError(`Unsupported OpenDocument type "${mimetype.trim()}"`);
  }
  if (archive.hasEntry('content.xml') && !archive.hasEntry('[Content_Types].xml')) {
    return { format: 'ods', workbookPart: 'content.xml' };
  }

  const rootRels = archive.tryReadEntry('_rels/.rels');
  const target = rootRels
    ? packageRelationships(rootRels).find((rel) => OFFICE_DOCUMENT_REL.test(rel.type))?.target
    : undefined;
  const candidates = target ? [resolvePartPath('', target)] : ['xl/workbook.xml', 'xl/workbook.bin'];

  for (const part of candidates) {
    if (!archive.hasEntry(part)) continue;
    if (part.toLowerCase().endsWith('.bin')) return { format: 'xlsb', workbookPart: part };
    if (part.toLowerCase().endsWith('.xml')) return { format: 'xlsx', workbookPart: part };
  }
  throw new UnsupportedFormatError('Zip archive contains no spreadsheet workbook part');
}
