import { resolvePartPath } from '../../container/container-reader';
import type { EntryContainer } from '../../container/container-reader';
import { XmlEventSource, localName } from '../../container/xml-source';

export interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

export function parseRelationships(bytes: Uint8Array): Relationship[] {
  const relationships: Relationship[] = [];
  new XmlEventSource(bytes, {
    open(element) {
      if (localName(element.name) !== 'Relationship') return;
      const { Id, Type, Target, TargetMode } = element.attributes;
      if (Id === undefined || Target === undefined) return;
      relationships.push({ id: Id, type: Type ?? '', target: Target, external: TargetMode === 'External' });
    },
  }).drain();
  return relationships;
}

/** `xl/workbook.xml` → `xl/_rels/workbook.xml.rels` */
export function relationshipsPartFor(part: string): string {
  const slash = part.lastIndexOf('/');
  return `${part.slice(0, slash + 1)}_rels/${part.slice(slash + 1)}.rels`;
}

/**
 * The relationships of a workbook part, keyed by id, with a lookup for
 * the part a relationship type points at. Both OOXML flavours share it.
 */
export class PartRelationships {
  private readonly byId = new Map<string, Relationship>();

  constructor(
    private readonly archive: EntryContainer,
    private readonly source: string,
  ) {
    const bytes = archive.tryReadEntry(relationshipsPartFor(source));
    for (const rel of bytes ? parseRelationships(bytes) : []) this.byId.set(rel.id, rel);
  }

  get(id: string): Relationship | undefined {
    return this.byId.get(id);
  }

  resolve(rel: Relationship): string {
    return resolvePartPath(this.source, rel.target);
  }

  /** Part targeted by the first relationship whose type matches, else `fallback` if the archive has it. */
  related(type: RegExp, fallback: string): string | null {
    const rel = [...this.byId.values()].find((candidate) => type.test(candidate.type));
    const part = rel ? this.resolve(rel) : fallback;
    return this.archive.hasEntry(part) ? part : null;
  }
}
