import { SaxesParser, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Read-only element tree produced from SAX events. */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
  location: XmlLocation;
  /** XPath-like address with sibling indexes, e.g. `/score-partwise[1]/part[2]`. */
  path: string;
}

/** Well-formedness failure with the parser position where it happened. */
export class XmlSyntaxError extends Error {
  readonly location?: XmlLocation;

  constructor(message: string, location?: XmlLocation) {
    super(message);
    this.name = 'XmlSyntaxError';
    this.location = location;
  }
}

interface ElementBuilder extends XmlElement {
  children: ElementBuilder[];
  siblingCounts: Map<string, number>;
}

/**
 * Parse XML text into an element tree. Namespace prefixes are dropped from
 * element and attribute names; DOCTYPE declarations are skipped.
 */
export function parseXmlDocument(xmlText: string, sourceName?: string): XmlElement {
  const parser = new SaxesParser({ xmlns: true, position: true, fileName: sourceName });

  const stack: ElementBuilder[] = [];
  const openPositions: XmlLocation[] = [];
  let root: ElementBuilder | undefined;
  let failure: XmlSyntaxError | undefined;

  parser.on('error', (error) => {
    failure ??= new XmlSyntaxError(error.message, { line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentagstart', () => {
    openPositions.push({ line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentag', (tag) => {
    const parent = stack.at(-1);
    const name = localName(tag);
    const element: ElementBuilder = {
      name,
      attributes: collectAttributes(tag),
      children: [],
      text: '',
      location: openPositions.pop() ?? { line: parser.line, column: parser.column + 1 },
      path: childPath(parent, name),
      siblingCounts: new Map()
    };

    if (parent) {
      parent.children.push(element);
    } else {
      root = element;
    }
    stack.push(element);
  });

  const appendText = (text: string): void => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  parser.on('closetag', () => {
    stack.pop();
  });

  parser.write(xmlText).close();

  if (failure) {
    throw failure;
  }
  if (!root) {
    throw new XmlSyntaxError('No XML root element found');
  }

  return seal(root);
}

function localName(tag: SaxesTag): string {
  if (tag.local) {
    return tag.local;
  }
  const index = tag.name.indexOf(':');
  return index === -1 ? tag.name : tag.name.slice(index + 1);
}

function collectAttributes(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, attribute] of Object.entries(tag.attributes)) {
    if (typeof attribute === 'string') {
      out[key] = attribute;
      continue;
    }
    out[key] = attribute.value;
    if ('local' in attribute && attribute.local) {
      out[attribute.local] = attribute.value;
    }
  }
  return out;
}

function childPath(parent: ElementBuilder | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }
  const index = (parent.siblingCounts.get(name) ?? 0) + 1;
  parent.siblingCounts.set(name, index);
  return `${parent.path}/${name}[${index}]`;
}

function seal(element: ElementBuilder): XmlElement {
  return {
    name: element.name,
    attributes: element.attributes,
    children: element.children.map(seal),
    text: element.text,
    location: element.location,
    path: element.path
  };
}
