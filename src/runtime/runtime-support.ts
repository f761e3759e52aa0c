// Runtime-support library linked against generated IR (the rt.* externs)

import { DocumentHandle, JsonObject, RuntimeTrap, RuntimeValue, XmlElement } from './values';

export type OutputSink = (text: string) => void;

export function formatInt(value: number): string {
  return String(value | 0);
}

// Floating point values print with six decimals
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  return value.toFixed(6);
}

// Shortest text that reads back to the same number; non-finite values by name
export function serializeNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (!Number.isFinite(value)) return value > 0 ? 'Infinity' : '-Infinity';
  return Object.is(value, -0) ? '-0' : String(value);
}

// JSON has no literal for NaN or the infinities; they travel as strings
export function jsonNumberText(value: number): string {
  return Number.isFinite(value) ? serializeNumber(value) : JSON.stringify(serializeNumber(value));
}

const NON_FINITE = ['NaN', 'Infinity', '-Infinity'];

export function formatBool(value: boolean): string {
  return value ? 'true' : 'false';
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);
}

export function unescapeXml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|apos|#(\d+)|#x([0-9a-fA-F]+));/g, (match, name: string, dec?: string, hex?: string) => {
    if (dec) return String.fromCodePoint(Number(dec));
    if (hex) return String.fromCodePoint(parseInt(hex, 16));
    switch (name) {
      case 'amp': return '&';
      case 'lt': return '<';
      case 'gt': return '>';
      case 'quot': return '"';
      case 'apos': return "'";
      default: return match;
    }
  });
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonDocument(text: string): DocumentHandle {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new RuntimeTrap(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isJsonObject(value)) {
    throw new RuntimeTrap('JSON document must be an object');
  }
  return new DocumentHandle({ format: 'json', value });
}

/**
 * Minimal XML reader for documents written by `as_xml`: elements, attributes,
 * text with entity references, comments and an optional declaration.
 * Mixed content keeps only the text of an element without child elements.
 */
export class XmlReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): XmlElement {
    this.skipProlog();
    const root = this.parseElement();
    this.skipMisc();
    if (this.pos < this.text.length) {
      this.fail('Unexpected content after the root element');
    }
    return root;
  }

  private parseElement(): XmlElement {
    this.expect('<');
    const name = this.readName();
    const attributes = new Map<string, string>();

    for (;;) {
      this.skipWhitespace();
      if (this.text.startsWith('/>', this.pos)) {
        this.pos += 2;
        return { name, attributes, children: [], text: '' };
      }
      if (this.peek() === '>') {
        this.pos++;
        break;
      }
      const attribute = this.readName();
      this.skipWhitespace();
      this.expect('=');
      this.skipWhitespace();
      const quote = this.peek();
      if (quote !== '"' && quote !== "'") this.fail(`Expected a quoted value for attribute '${attribute}'`);
      this.pos++;
      const end = this.text.indexOf(quote, this.pos);
      if (end < 0) this.fail(`Unterminated value for attribute '${attribute}'`);
      attributes.set(attribute, unescapeXml(this.text.slice(this.pos, end)));
      this.pos = end + 1;
    }

    const children: XmlElement[] = [];
    let text = '';
    for (;;) {
      if (this.pos >= this.text.length) this.fail(`Unclosed element <${name}>`);
      if (this.text.startsWith('</', this.pos)) {
        this.pos += 2;
        const closing = this.readName();
        if (closing !== name) this.fail(`Expected </${name}> but found </${closing}>`);
        this.skipWhitespace();
        this.expect('>');
        break;
      }
      if (this.text.startsWith('<!--', this.pos)) {
        this.skipComment();
        continue;
      }
      if (this.peek() === '<') {
        children.push(this.parseElement());
        continue;
      }
      const next = this.text.indexOf('<', this.pos);
      const end = next < 0 ? this.text.length : next;
      text += this.text.slice(this.pos, end);
      this.pos = end;
    }

    return { name, attributes, children, text: children.length > 0 ? '' : unescapeXml(text) };
  }

  private skipProlog(): void {
    this.skipWhitespace();
    if (this.text.startsWith('<?xml', this.pos)) {
      const end = this.text.indexOf('?>', this.pos);
      if (end < 0) this.fail('Unterminated XML declaration');
      this.pos = end + 2;
    }
    this.skipMisc();
  }

  private skipMisc(): void {
    this.skipWhitespace();
    while (this.text.startsWith('<!--', this.pos)) {
      this.skipComment();
      this.skipWhitespace();
    }
  }

  private skipComment(): void {
    const end = this.text.indexOf('-->', this.pos);
    if (end < 0) this.fail('Unterminated comment');
    this.pos = end + 3;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private readName(): string {
    const match = /^[A-Za-z_][\w.-]*/.exec(this.text.slice(this.pos));
    if (!match) this.fail('Expected a name');
    this.pos += match[0].length;
    return match[0];
  }

  private peek(): string {
    return this.text[this.pos] ?? '';
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) this.fail(`Expected '${ch}'`);
    this.pos++;
  }

  private fail(message: string): never {
    throw new RuntimeTrap(`Invalid XML at offset ${this.pos}: ${message}`);
  }
}

export function parseXmlDocument(text: string, rootName: string): DocumentHandle {
  const root = new XmlReader(text).parseDocument();
  if (root.name !== rootName) {
    throw new RuntimeTrap(`Expected root element <${rootName}> but found <${root.name}>`);
  }
  return new DocumentHandle({ format: 'xml', value: root });
}

function documentOf(value: RuntimeValue, format: 'json' | 'xml'): DocumentHandle {
  if (!(value instanceof DocumentHandle) || value.document.format !== format) {
    throw new RuntimeTrap(`Expected a ${format.toUpperCase()} document handle`);
  }
  return value;
}

function stringArg(value: RuntimeValue): string {
  if (typeof value !== 'string') throw new RuntimeTrap('Expected a string argument');
  return value;
}

function numberArg(value: RuntimeValue): number {
  if (typeof value !== 'number') throw new RuntimeTrap('Expected a numeric argument');
  return value;
}

function jsonField(doc: DocumentHandle, key: string): unknown {
  const { document } = doc;
  if (document.format !== 'json') throw new RuntimeTrap('Expected a JSON document handle');
  return Object.hasOwn(document.value, key) ? document.value[key] : undefined;
}

function xmlChild(doc: DocumentHandle, key: string): XmlElement | undefined {
  const { document } = doc;
  if (document.format !== 'xml') throw new RuntimeTrap('Expected an XML document handle');
  return document.value.children.find(child => child.name === key);
}

function requireXmlChild(doc: DocumentHandle, key: string): XmlElement {
  const child = xmlChild(doc, key);
  if (!child) throw new RuntimeTrap(`Missing element <${key}>`);
  return child;
}

function jsonNumber(doc: DocumentHandle, key: string): number {
  const value = jsonField(doc, key);
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && NON_FINITE.includes(value)) return Number(value);
  throw new RuntimeTrap(`Field '${key}' is not a number`);
}

function xmlNumber(doc: DocumentHandle, key: string): number {
  const text = requireXmlChild(doc, key).text.trim();
  if (text === 'NaN') return Number.NaN;
  const value = Number(text);
  if (text === '' || Number.isNaN(value)) throw new RuntimeTrap(`Element <${key}> is not a number`);
  return value;
}

function integer(value: number, key: string): number {
  if (!Number.isInteger(value)) throw new RuntimeTrap(`Field '${key}' is not an integer`);
  return value | 0;
}

/**
 * Implementations of the rt.* externs. Output goes to the sink given at
 * construction.
 */
export class RuntimeSupport {
  constructor(private readonly write: OutputSink) {}

  call(name: string, args: RuntimeValue[]): RuntimeValue | undefined {
    switch (name) {
      case 'rt.print':
        this.write(stringArg(args[0]));
        return undefined;
      case 'rt.println':
        this.write(stringArg(args[0]) + '\n');
        return undefined;
      case 'rt.trap':
        throw new RuntimeTrap(stringArg(args[0]));
      case 'rt.fmt_i32':
        return formatInt(numberArg(args[0]));
      case 'rt.fmt_f32':
      case 'rt.fmt_f64':
        return formatFloat(numberArg(args[0]));
      case 'rt.fmt_bool':
        return formatBool(args[0] === true);
      case 'rt.json_quote':
        return JSON.stringify(stringArg(args[0]));
      case 'rt.json_write_f32':
      case 'rt.json_write_f64':
        return jsonNumberText(numberArg(args[0]));
      case 'rt.xml_write_f32':
      case 'rt.xml_write_f64':
        return serializeNumber(numberArg(args[0]));
      case 'rt.xml_escape':
        return escapeXml(stringArg(args[0]));
      case 'rt.json_parse':
        return parseJsonDocument(stringArg(args[0]));
      case 'rt.xml_parse':
        return parseXmlDocument(stringArg(args[0]), stringArg(args[1]));
    }

    if (name.startsWith('rt.json_')) {
      return this.jsonAccess(name.slice('rt.json_'.length), documentOf(args[0], 'json'), stringArg(args[1]));
    }
    if (name.startsWith('rt.xml_')) {
      return this.xmlAccess(name.slice('rt.xml_'.length), documentOf(args[0], 'xml'), stringArg(args[1]));
    }
    throw new RuntimeTrap(`Unknown runtime function '${name}'`);
  }

  private jsonAccess(operation: string, doc: DocumentHandle, key: string): RuntimeValue {
    switch (operation) {
      case 'has':
        return jsonField(doc, key) !== undefined;
      case 'is_null':
        return jsonField(doc, key) === null;
      case 'get_i32':
        return integer(jsonNumber(doc, key), key);
      case 'get_f32':
        return Math.fround(jsonNumber(doc, key));
      case 'get_f64':
        return jsonNumber(doc, key);
      case 'get_bool': {
        const value = jsonField(doc, key);
        if (typeof value !== 'boolean') throw new RuntimeTrap(`Field '${key}' is not a boolean`);
        return value;
      }
      case 'get_str': {
        const value = jsonField(doc, key);
        if (typeof value !== 'string') throw new RuntimeTrap(`Field '${key}' is not a string`);
        return value;
      }
      case 'get_object': {
        const value = jsonField(doc, key);
        if (!isJsonObject(value)) throw new RuntimeTrap(`Field '${key}' is not an object`);
        return new DocumentHandle({ format: 'json', value });
      }
      default:
        throw new RuntimeTrap(`Unknown runtime function 'rt.json_${operation}'`);
    }
  }

  private xmlAccess(operation: string, doc: DocumentHandle, key: string): RuntimeValue {
    switch (operation) {
      case 'has':
        return xmlChild(doc, key) !== undefined;
      case 'is_null':
        return xmlChild(doc, key)?.attributes.get('null') === 'true';
      case 'get_i32':
        return integer(xmlNumber(doc, key), key);
      case 'get_f32':
        return Math.fround(xmlNumber(doc, key));
      case 'get_f64':
        return xmlNumber(doc, key);
      case 'get_bool': {
        const text = requireXmlChild(doc, key).text.trim();
        if (text !== 'true' && text !== 'false') throw new RuntimeTrap(`Element <${key}> is not a boolean`);
        return text === 'true';
      }
      case 'get_str':
        return requireXmlChild(doc, key).text;
      case 'get_object':
        return new DocumentHandle({ format: 'xml', value: requireXmlChild(doc, key) });
      default:
        throw new RuntimeTrap(`Unknown runtime function 'rt.xml_${operation}'`);
    }
  }
}
