import * as cheerio from 'cheerio';
import { isTag, type AnyNode } from 'domhandler';

/**
 * The slice of an element that listing extraction needs. Implemented over
 * Playwright element handles for rendered pages and over cheerio for static
 * HTML, so the same selector chains work on both.
 */
export interface DomNode {
  query(selector: string): Promise<DomNode | null>;
  queryAll(selector: string): Promise<DomNode[]>;
  text(): Promise<string>;
  attr(name: string): Promise<string | null>;
  tagName(): Promise<string>;
}

export class StaticNode implements DomNode {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly node: AnyNode,
  ) {}

  async query(selector: string): Promise<DomNode | null> {
    const [first] = await this.queryAll(selector);
    return first ?? null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    return this.$(this.node)
      .find(selector)
      .toArray()
      .map((el) => new StaticNode(this.$, el));
  }

  async text(): Promise<string> {
    return this.$(this.node).text();
  }

  async attr(name: string): Promise<string | null> {
    if (!isTag(this.node)) return null;
    return this.node.attribs[name] ?? null;
  }

  async tagName(): Promise<string> {
    return isTag(this.node) ? this.node.name.toLowerCase() : '';
  }
}

export function loadStaticDocument(html: string): { $: cheerio.CheerioAPI; root: StaticNode } {
  const $ = cheerio.load(html);
  const [doc] = $.root().toArray();
  return { $, root: new StaticNode($, doc) };
}

export function normalizeText(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}
