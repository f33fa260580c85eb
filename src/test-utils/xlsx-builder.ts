import { packZip } from './packages';
import type { EntryContent } from './packages';

const MAIN_NS = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const REL_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const REL_BASE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export interface XlsxSheetSpec {
  name: string;
  /** Body of the worksheet element, e.g. `<sheetData>…</sheetData>`. */
  body: string;
  state?: 'hidden' | 'veryHidden';
  /** Relationship type suffix; defaults to `worksheet`. */
  kind?: 'worksheet' | 'chartsheet' | 'dialogsheet';
}

export interface XlsxSpec {
  sheets: XlsxSheetSpec[];
  sharedStrings?: string[];
  /** Overrides the `uniqueCount` written on the shared string table. */
  declaredUniqueCount?: number;
  numFmts?: Array<{ id: number; code: string }>;
  /** `numFmtId` of each `cellXfs` entry, in order. */
  cellXfs?: number[];
  date1904?: boolean;
  definedNames?: Array<{ name: string; formula: string; localSheetId?: number; hidden?: boolean }>;
  /** Extra entries copied into the archive verbatim. */
  extra?: Record<string, EntryContent>;
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** `<c>` element helper: `cell('B2', '3')`, `cell('A1', '0', { t: 's' })`. */
export function cell(ref: string, value: string | null, attrs: Record<string, string | number> = {}): string {
  const extra = Object.entries(attrs)
    .map(([key, attr]) => ` ${key}="${escapeXml(String(attr))}"`)
    .join('');
  return value === null ? `<c r="${ref}"${extra}/>` : `<c r="${ref}"${extra}><v>${escapeXml(value)}</v></c>`;
}

export function row(index: number, cells: string[]): string {
  return `<row r="${index}">${cells.join('')}</row>`;
}

export function sheetData(rows: string[]): string {
  return `<sheetData>${rows.join('')}</sheetData>`;
}

function workbookXml(spec: XlsxSpec): string {
  const sheets = spec.sheets
    .map((sheet, i) => {
      const state = sheet.state ? ` state="${sheet.state}"` : '';
      return `<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}"${state} r:id="rId${i + 1}"/>`;
    })
    .join('');
  const names = (spec.definedNames ?? [])
    .map((name) => {
      const local = name.localSheetId === undefined ? '' : ` localSheetId="${name.localSheetId}"`;
      const hidden = name.hidden ? ' hidden="1"' : '';
      return `<definedName name="${escapeXml(name.name)}"${local}${hidden}>${escapeXml(name.formula)}</definedName>`;
    })
    .join('');
  const pr = spec.date1904 ? '<workbookPr date1904="1"/>' : '<workbookPr/>';
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<workbook xmlns="${MAIN_NS}" xmlns:r="${REL_NS}">${pr}<sheets>${sheets}</sheets>` +
    (names ? `<definedNames>${names}</definedNames>` : '') +
    `</workbook>`
  );
}

function workbookRels(spec: XlsxSpec): string {
  const rels = spec.sheets.map(
    (sheet, i) =>
      `<Relationship Id="rId${i + 1}" Type="${REL_BASE}/${sheet.kind ?? 'worksheet'}" Target="worksheets/sheet${i + 1}.xml"/>`,
  );
  const next = spec.sheets.length + 1;
  if (spec.sharedStrings) {
    rels.push(`<Relationship Id="rId${next}" Type="${REL_BASE}/sharedStrings" Target="sharedStrings.xml"/>`);
  }
  rels.push(`<Relationship Id="rId${next + 1}" Type="${REL_BASE}/styles" Target="styles.xml"/>`);
  return `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${rels.join('')}</Relationships>`;
}

function stylesXml(spec: XlsxSpec): string {
  const fmts = spec.numFmts ?? [];
  const numFmts = fmts.length
    ? `<numFmts count="${fmts.length}">${fmts
        .map((fmt) => `<numFmt numFmtId="${fmt.id}" formatCode="${escapeXml(fmt.code)}"/>`)
        .join('')}</numFmts>`
    : '';
  const xfs = (spec.cellXfs ?? [0]).map((id) => `<xf numFmtId="${id}" fontId="0" fillId="0" borderId="0" xfId="0"/>`);
  return (
    `<?xml version="1.0" encoding="UTF-8"?><styleSheet xmlns="${MAIN_NS}">${numFmts}` +
    `<cellStyleXfs count="1"><xf numFmtId="0" fontId="0"/></cellStyleXfs>` +
    `<cellXfs count="${xfs.length}">${xfs.join('')}</cellXfs></styleSheet>`
  );
}

function sharedStringsXml(strings: string[], declared: number | undefined): string {
  const items = strings.map((text) => `<si><t xml:space="preserve">${escapeXml(text)}</t></si>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><sst xmlns="${MAIN_NS}" count="${strings.length}" uniqueCount="${declared ?? strings.length}">${items}</sst>`;
}

export function worksheetXml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><worksheet xmlns="${MAIN_NS}" xmlns:r="${REL_NS}">${body}</worksheet>`;
}

/** Parts of a minimal OOXML workbook, before packing. */
export function xlsxEntries(spec: XlsxSpec): Record<string, EntryContent> {
  const entries: Record<string, EntryContent> = {
    '[Content_Types].xml':
      '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="xml" ContentType="application/xml"/></Types>',
    '_rels/.rels': `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId1" Type="${REL_BASE}/officeDocument" Target="xl/workbook.xml"/></Relationships>`,
    'xl/workbook.xml': workbookXml(spec),
    'xl/_rels/workbook.xml.rels': workbookRels(spec),
    'xl/styles.xml': stylesXml(spec),
  };
  if (spec.sharedStrings) {
    entries['xl/sharedStrings.xml'] = sharedStringsXml(spec.sharedStrings, spec.declaredUniqueCount);
  }
  spec.sheets.forEach((sheet, i) => {
    entries[`xl/worksheets/sheet${i + 1}.xml`] = worksheetXml(sheet.body);
  });
  return { ...entries, ...spec.extra };
}

export function buildXlsx(spec: XlsxSpec): Uint8Array {
  return packZip(xlsxEntries(spec));
}
