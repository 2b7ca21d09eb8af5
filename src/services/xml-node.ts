import { parseStringPromise } from 'xml2js';

type RawElement = string | Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawElement(value: unknown): value is RawElement {
  return typeof value === 'string' || isRecord(value);
}

/**
 * Read-only view of an XML element. Wraps the object tree produced by
 * xml2js so callers only deal with element names, attributes and text.
 */
export class XmlNode {
  private constructor(readonly name: string, private readonly raw: RawElement) {}

  /**
   * Parse an XML string. The returned node is the document; its only child
   * is the root element.
   * @throws if the XML is not well-formed
   */
  static async parse(xml: string): Promise<XmlNode> {
    const result: unknown = await parseStringPromise(xml, {
      explicitArray: true,
      explicitRoot: true,
      attrkey: '$',
      charkey: '_',
    });

    const document: Record<string, unknown> = {};
    if (isRecord(result)) {
      for (const [rootName, rootValue] of Object.entries(result)) {
        document[rootName] = [rootValue];
      }
    }
    return new XmlNode('#document', document);
  }

  /**
   * Child elements with the given name, in document order.
   */
  children(name: string): XmlNode[] {
    if (typeof this.raw === 'string' || name === '$' || name === '_') {
      return [];
    }

    const value = this.raw[name];
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter(isRawElement).map(child => new XmlNode(name, child));
  }

  /**
   * Select the first element matching a slash-separated path of element
   * names, e.g. "/info" from the document or "method/description" from an
   * element. A leading slash is ignored.
   */
  selectFirst(path: string): XmlNode | undefined {
    const steps = path.split('/').filter(step => step.length > 0);

    let current: XmlNode | undefined = this;
    for (const step of steps) {
      current = current.children(step)[0];
      if (!current) {
        return undefined;
      }
    }
    return current;
  }

  /**
   * @returns the attribute value or an empty string if not present
   */
  attribute(name: string): string {
    if (typeof this.raw === 'string') {
      return '';
    }
    const attributes = this.raw.$;
    if (!isRecord(attributes)) {
      return '';
    }
    const value = attributes[name];
    return typeof value === 'string' ? value : '';
  }

  text(): string {
    if (typeof this.raw === 'string') {
      return this.raw;
    }
    const value = this.raw._;
    return typeof value === 'string' ? value : '';
  }
}
