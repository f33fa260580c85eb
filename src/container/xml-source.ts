import * as sax from 'sax';
import { TextDecoder } from 'util';
import { StreamFramingError } from '../errors';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  selfClosing: boolean;
}

export interface XmlHandlers {
  open?(element: XmlElement): void;
  close?(name: string): void;
  text?(text: string): void;
}

/**
 * Feeds an XML part to a strict SAX parser one chunk at a time. Callers
 * pump until their handlers have produced what they need, which keeps
 * sheet parsing lazy: only the bytes up to the requested row are parsed.
 */
export class XmlEventSource {
  private readonly parser: sax.SAXParser;
  private readonly decoder = new TextDecoder('utf-8');
  private offset = 0;
  private finished = false;
  private failure: Error | null = null;

  constructor(
    private readonly bytes: Uint8Array,
    handlers: XmlHandlers,
    private readonly chunkSize: number = DEFAULT_CHUNK_SIZE,
  ) {
    this.parser = sax.parser(true, { trim: false, normalize: false, position: true });
    this.parser.onopentag = (tag) => {
      handlers.open?.({ name: tag.name, attributes: flattenAttributes(tag), selfClosing: tag.isSelfClosing });
    };
    this.parser.onclosetag = (name) => handlers.close?.(name);
    this.parser.ontext = (text) => handlers.text?.(text);
    this.parser.oncdata = (text) => handlers.text?.(text);
    this.parser.onerror = (error) => {
      this.failure = error;
    };
  }

  get done(): boolean {
    return this.finished;
  }

  /** Parses the next chunk; returns `false` once the whole part has been parsed. */
  pump(): boolean {
    if (this.finished) return false;
    if (this.offset >= this.bytes.length) {
      this.finished = true;
      this.feed(() => this.parser.write(this.decoder.decode()).close());
      return false;
    }
    const end = Math.min(this.offset + this.chunkSize, this.bytes.length);
    const chunk = this.decoder.decode(this.bytes.subarray(this.offset, end), { stream: true });
    this.offset = end;
    this.feed(() => this.parser.write(chunk));
    return true;
  }

  drain(): void {
    while (this.pump()) {
      // handlers collect everything
    }
  }

  /** Abandons parsing once the chunk being fed has been handled. */
  stop(): void {
    this.finished = true;
  }

  private feed(write: () => void): void {
    try {
      write();
    } catch (error) {
      this.failure = error instanceof Error ? error : new Error(String(error));
    }
    if (this.failure) {
      this.finished = true;
      const reason = this.failure.message.split('\n')[0];
      throw new StreamFramingError(`Malformed XML: ${reason}`, this.parser.position);
    }
  }
}

function flattenAttributes(tag: sax.Tag | sax.QualifiedTag): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const key of Object.keys(tag.attributes)) {
    const raw: string | sax.QualifiedAttribute = tag.attributes[key];
    attributes[key] = typeof raw === 'string' ? raw : raw.value;
  }
  return attributes;
}

/** Local part of a prefixed XML name: `x:row` → `row`. */
export function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}
