import { XmlEventSource, localName } from '../../container/xml-source';
import type { SharedTablesBuilder, WarningLog } from '../../shared-tables';
import type { SheetVisibility } from '../../types';

export interface WorkbookSheetEntry {
  name: string;
  relationshipId: string;
  visibility: SheetVisibility;
}

export interface RawDefinedName {
  name: string;
  localSheetId: number | null;
  hidden: boolean;
  formula: string;
}

export interface WorkbookPart {
  sheets: WorkbookSheetEntry[];
  definedNames: RawDefinedName[];
  date1904: boolean;
}

const ESCAPED_CHAR = /_x([0-9A-Fa-f]{4})_/g;

/** Undoes the `_xHHHH_` escaping OOXML applies to characters XML cannot carry. */
export function unescapeOoxml(text: string): string {
  return text.includes('_x') ? text.replace(ESCAPED_CHAR, (_, hex: string) => String.fromCharCode(parseInt(hex, 16))) : text;
}

export function isTruthyAttribute(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

function attributeByLocalName(attributes: Record<string, string>, name: string): string | undefined {
  for (const key of Object.keys(attributes)) {
    if (key === name || key.endsWith(`:${name}`)) return attributes[key];
  }
  return undefined;
}

export function parseWorkbookPart(bytes: Uint8Array, chunkSize: number): WorkbookPart {
  const part: WorkbookPart = { sheets: [], definedNames: [], date1904: false };
  let pendingName: Omit<RawDefinedName, 'formula'> | null = null;
  let formula = '';

  new XmlEventSource(
    bytes,
    {
      open(element) {
        const { attributes } = element;
        switch (localName(element.name)) {
          case 'workbookPr':
            part.date1904 = isTruthyAttribute(attributes.date1904);
            break;
          case 'sheet': {
            const state = attributes.state;
            part.sheets.push({
              name: unescapeOoxml(attributes.name ?? ''),
              relationshipId: attributeByLocalName(attributes, 'id') ?? '',
              visibility: state === 'hidden' ? 'hidden' : state === 'veryHidden' ? 'veryHidden' : 'visible',
            });
            break;
          }
          case 'definedName': {
            const localSheetId = attributes.localSheetId;
            pendingName = {
              name: attributes.name ?? '',
              localSheetId: localSheetId === undefined ? null : Number(localSheetId),
              hidden: isTruthyAttribute(attributes.hidden),
            };
            formula = '';
            break;
          }
        }
      },
      text(text) {
        if (pendingName) formula += text;
      },
      close(name) {
        if (localName(name) === 'definedName' && pendingName) {
          part.definedNames.push({ ...pendingName, formula: formula.trim() });
          pendingName = null;
        }
      },
    },
    chunkSize,
  ).drain();
  return part;
}

/**
 * Fills the builder's string table from `sharedStrings.xml`. Rich-text
 * runs are concatenated; phonetic (`rPh`) text is left out.
 */
export function parseSharedStrings(
  bytes: Uint8Array,
  builder: SharedTablesBuilder,
  warnings: WarningLog,
  chunkSize: number,
): void {
  let inItem = false;
  let inText = false;
  let phoneticDepth = 0;
  let current = '';
  const declared: { unique: number | null } = { unique: null };

  new XmlEventSource(
    bytes,
    {
      open(element) {
        switch (localName(element.name)) {
          case 'sst': {
            const unique = Number(element.attributes.uniqueCount);
            declared.unique = Number.isFinite(unique) && element.attributes.uniqueCount !== undefined ? unique : null;
            break;
          }
          case 'si':
            inItem = true;
            current = '';
            break;
          case 'rPh':
            phoneticDepth++;
            break;
          case 't':
            inText = inItem && phoneticDepth === 0;
            break;
        }
      },
      text(text) {
        if (inText) current += text;
      },
      close(name) {
        switch (localName(name)) {
          case 't':
            inText = false;
            break;
          case 'rPh':
            phoneticDepth--;
            break;
          case 'si':
            builder.addString(unescapeOoxml(current));
            inItem = false;
            break;
        }
      },
    },
    chunkSize,
  ).drain();

  if (declared.unique !== null && declared.unique !== builder.stringCount) {
    warnings.add({
      code: 'SST_COUNT_MISMATCH',
      message: `Shared string table declares ${declared.unique} entries but holds ${builder.stringCount}`,
    });
  }
}

/** Reads custom number formats and the `cellXfs` style → format assignments. */
export function parseStyles(
  bytes: Uint8Array,
  builder: SharedTablesBuilder,
  warnings: WarningLog,
  chunkSize: number,
): void {
  let inCellXfs = false;

  new XmlEventSource(
    bytes,
    {
      open(element) {
        const { attributes } = element;
        switch (localName(element.name)) {
          case 'numFmt': {
            const id = Number(attributes.numFmtId);
            const code = attributes.formatCode;
            if (!Number.isInteger(id) || code === undefined) {
              warnings.add({ code: 'BAD_NUMBER_FORMAT', message: `Skipped numFmt "${attributes.numFmtId ?? ''}"` });
              return;
            }
            builder.addFormat(id, code);
            break;
          }
          case 'cellXfs':
            inCellXfs = true;
            break;
          case 'xf':
            if (inCellXfs) {
              const id = Number(attributes.numFmtId ?? '0');
              builder.addStyle(Number.isInteger(id) ? id : -1);
            }
            break;
        }
      },
      close(name) {
        if (localName(name) === 'cellXfs') inCellXfs = false;
      },
    },
    chunkSize,
  ).drain();
}
