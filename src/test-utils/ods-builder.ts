import { packZip } from './packages';

const NAMESPACES = [
  'xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0"',
  'xmlns:style="urn:oasis:names:tc:opendocument:xmlns:style:1.0"',
  'xmlns:text="urn:oasis:names:tc:opendocument:xmlns:text:1.0"',
  'xmlns:table="urn:oasis:names:tc:opendocument:xmlns:table:1.0"',
  'xmlns:calcext="urn:org:documentfoundation:names:experimental:calc:xmlns:calcext:1.0"',
].join(' ');

export const ODS_MIMETYPE = 'application/vnd.oasis.opendocument.spreadsheet';

export interface OdsSpec {
  /** Children of `office:spreadsheet`: tables, named expressions, settings. */
  body: string;
  /** Children of `office:automatic-styles`. */
  styles?: string;
  /** Leave the `mimetype` entry out of the package. */
  omitMimetype?: boolean;
}

export function contentXml(spec: OdsSpec): string {
  return (
    `<?xml version="1.0" encoding="UTF-8"?>` +
    `<office:document-content ${NAMESPACES} office:version="1.3">` +
    `<office:automatic-styles>${spec.styles ?? ''}</office:automatic-styles>` +
    `<office:body><office:spreadsheet>${spec.body}</office:spreadsheet></office:body>` +
    `</office:document-content>`
  );
}

export function table(name: string, rows: string, styleName?: string): string {
  const style = styleName === undefined ? '' : ` table:style-name="${styleName}"`;
  return `<table:table table:name="${name}"${style}>${rows}</table:table>`;
}

export function floatCell(value: number, extra = ''): string {
  return `<table:table-cell office:value-type="float" office:value="${value}"${extra}><text:p>${value}</text:p></table:table-cell>`;
}

export function stringCell(text: string, extra = ''): string {
  return `<table:table-cell office:value-type="string"${extra}><text:p>${text}</text:p></table:table-cell>`;
}

export function buildOds(spec: OdsSpec): Uint8Array {
  const entries: Record<string, string> = {
    'META-INF/manifest.xml':
      '<?xml version="1.0" encoding="UTF-8"?><manifest:manifest xmlns:manifest="urn:oasis:names:tc:opendocument:xmlns:manifest:1.0">' +
      `<manifest:file-entry manifest:full-path="/" manifest:media-type="${ODS_MIMETYPE}"/>` +
      '<manifest:file-entry manifest:full-path="content.xml" manifest:media-type="text/xml"/></manifest:manifest>',
    'content.xml': contentXml(spec),
  };
  if (!spec.omitMimetype) entries.mimetype = ODS_MIMETYPE;
  return packZip(entries);
}
