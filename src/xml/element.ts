/**
 * XML Element Tree
 *
 * Minimal mutable element tree used to assemble job definitions. Modules
 * locate or create sections on a shared root and append their own subtrees.
 *
 * @module xml/element
 */

/**
 * Escape text for use in element content or attribute values
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Serialization options
 */
export interface SerializeOptions {
  /** Indentation unit; omit for compact output */
  indent?: string;
  /** Prepend an XML declaration */
  declaration?: boolean;
}

/**
 * A single XML element with ordered children
 */
export class XmlElement {
  readonly tag: string;
  readonly attributes: Record<string, string>;
  readonly children: XmlElement[] = [];
  text: string | null = null;

  constructor(tag: string, attributes: Record<string, string> = {}) {
    this.tag = tag;
    this.attributes = { ...attributes };
  }

  /**
   * Append a new child element and return it
   */
  subElement(tag: string, attributes: Record<string, string> = {}): XmlElement {
    const child = new XmlElement(tag, attributes);
    this.children.push(child);
    return child;
  }

  /**
   * Append a new child element holding the given text
   */
  appendText(tag: string, text: string): XmlElement {
    const child = this.subElement(tag);
    child.text = text;
    return child;
  }

  /**
   * First direct child with the given tag
   */
  find(tag: string): XmlElement | undefined {
    return this.children.find((child) => child.tag === tag);
  }

  /**
   * All direct children with the given tag, in document order
   */
  findAll(tag: string): XmlElement[] {
    return this.children.filter((child) => child.tag === tag);
  }

  /**
   * Text of the first direct child with the given tag
   */
  findText(tag: string): string | null | undefined {
    return this.find(tag)?.text;
  }

  /**
   * Return the first direct child with the given tag, creating it if absent
   */
  findOrCreate(tag: string): XmlElement {
    return this.find(tag) ?? this.subElement(tag);
  }

  toString(options: SerializeOptions = {}): string {
    const body = this.render(options.indent, 0);
    return options.declaration
      ? `<?xml version="1.0" encoding="utf-8"?>\n${body}`
      : body;
  }

  private render(indent: string | undefined, depth: number): string {
    const pad = indent ? indent.repeat(depth) : '';
    const attrs = Object.entries(this.attributes)
      .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
      .join('');
    const text = this.text === null ? '' : escapeXml(this.text);

    if (this.children.length === 0) {
      return text === ''
        ? `${pad}<${this.tag}${attrs}/>`
        : `${pad}<${this.tag}${attrs}>${text}</${this.tag}>`;
    }

    const newline = indent ? '\n' : '';
    const inner = this.children
      .map((child) => child.render(indent, depth + 1))
      .join(newline);
    return `${pad}<${this.tag}${attrs}>${text}${newline}${inner}${newline}${pad}</${this.tag}>`;
  }
}
