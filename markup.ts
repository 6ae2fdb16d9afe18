import { load, type Cheerio } from "cheerio";
import { isTag, type AnyNode } from "domhandler";

/**
 * Attribute name to exact value; every entry must match.
 */
export type AttributeFilters = Readonly<Record<string, string>>;

export interface FindOptions {
  /**
   * Search descendants (default) or only direct children.
   */
  recursive?: boolean;
}

/**
 * Read-only view of one element of a parsed XML document.
 */
export interface MarkupNode {
  readonly tag: string;
  attribute(name: string): string | undefined;
  text(): string;
  find(tag: string, filters?: AttributeFilters, options?: FindOptions): MarkupNode | undefined;
  findAll(tag: string, filters?: AttributeFilters, options?: FindOptions): MarkupNode[];
}

function escapeAttributeValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export function buildSelector(tag: string, filters: AttributeFilters = {}): string {
  const attributes = Object.entries(filters)
    .map(([name, value]) => `[${name}="${escapeAttributeValue(value)}"]`)
    .join("");
  return `${tag}${attributes}`;
}

class CheerioMarkupNode<T extends AnyNode> implements MarkupNode {
  readonly tag: string;

  constructor(private readonly selection: Cheerio<T>) {
    const node = selection.get(0);
    this.tag = node && isTag(node) ? node.name : "";
  }

  attribute(name: string): string | undefined {
    return this.selection.attr(name);
  }

  text(): string {
    return this.selection.text();
  }

  find(tag: string, filters?: AttributeFilters, options?: FindOptions): MarkupNode | undefined {
    return this.findAll(tag, filters, options)[0];
  }

  findAll(tag: string, filters?: AttributeFilters, options: FindOptions = {}): MarkupNode[] {
    const selector = buildSelector(tag, filters);
    const found = options.recursive === false ? this.selection.children(selector) : this.selection.find(selector);
    return Array.from({ length: found.length }, (_, index) => new CheerioMarkupNode(found.eq(index)));
  }
}

/**
 * Parses an XML document. Tag and attribute names keep their case.
 */
export function parseMarkup(xml: string): MarkupNode {
  const $ = load(xml, { xml: true });
  return new CheerioMarkupNode($.root());
}
