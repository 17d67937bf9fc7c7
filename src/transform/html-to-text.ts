import * as cheerio from 'cheerio';
import { type AnyNode, type Element, isTag, isText } from 'domhandler';

import { decodeTextBytes } from './text-decoding.js';

export interface RenderOptions {
  /** Drop navigation, header, footer, aside and ad/menu containers. */
  stripBoilerplate?: boolean;
}

const BLOCK_ELEMENTS: ReadonlySet<string> = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'br',
  'caption',
  'dd',
  'details',
  'dialog',
  'div',
  'dl',
  'dt',
  'fieldset',
  'figcaption',
  'figure',
  'footer',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hgroup',
  'hr',
  'legend',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'summary',
  'table',
  'tbody',
  'tfoot',
  'thead',
  'tr',
  'ul',
]);

const NON_RENDERED_ELEMENTS: ReadonlySet<string> = new Set([
  'audio',
  'canvas',
  'embed',
  'head',
  'iframe',
  'math',
  'noscript',
  'object',
  'script',
  'style',
  'svg',
  'template',
  'video',
]);

const BOILERPLATE_ELEMENTS: ReadonlySet<string> = new Set([
  'aside',
  'footer',
  'header',
  'nav',
]);

const BOILERPLATE_TOKEN = /(?:^|[\s_-])(?:nav|menu|sidebar|ads?|advert\w*)(?:$|[\s_-])/i;
const CELL_ELEMENTS: ReadonlySet<string> = new Set(['td', 'th']);
const LIST_ELEMENTS: ReadonlySet<string> = new Set(['ol', 'ul']);
const CELL_SEPARATOR = ' | ';
const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;
const WHITESPACE_RUN = /\s+/g;

function isBoilerplate(element: Element): boolean {
  if (BOILERPLATE_ELEMENTS.has(element.name)) return true;
  const { class: className, id } = element.attribs;
  return (
    (className !== undefined && BOILERPLATE_TOKEN.test(className)) ||
    (id !== undefined && BOILERPLATE_TOKEN.test(id))
  );
}

class ParagraphBuilder {
  private readonly paragraphs: string[] = [];
  private buffer = '';
  private marker = '';
  private cellGap = false;

  append(text: string): void {
    const normalized = text
      .replace(ZERO_WIDTH, '')
      .replace(WHITESPACE_RUN, ' ');
    if (/\S/.test(normalized)) {
      if (this.cellGap) {
        this.buffer = `${this.buffer.trimEnd()}${CELL_SEPARATOR}`;
      }
      this.buffer += this.marker;
      this.marker = '';
      this.cellGap = false;
    }
    this.buffer += normalized;
  }

  /** The marker is written before the item's first text, if any. */
  startItem(marker: string): void {
    this.marker = marker;
  }

  endItem(): void {
    this.marker = '';
  }

  /** Separator between sibling cells of a table row; empty cells add none. */
  separate(): void {
    if (this.buffer.trim()) this.cellGap = true;
  }

  flush(): void {
    const paragraph = this.buffer.replace(/ {2,}/g, ' ').trim();
    if (paragraph) this.paragraphs.push(paragraph);
    this.buffer = '';
    this.cellGap = false;
  }

  finish(): string {
    this.flush();
    return this.paragraphs.join('\n\n');
  }
}

interface ListFrame {
  ordered: boolean;
  count: number;
}

type WalkStep =
  | { type: 'enter'; node: AnyNode }
  | { type: 'exit'; element: Element };

function pushChildren(stack: WalkStep[], nodes: readonly AnyNode[]): void {
  for (let i = nodes.length - 1; i >= 0; i -= 1) {
    const node = nodes[i];
    if (node) stack.push({ type: 'enter', node });
  }
}

function shouldSkip(element: Element, options: RenderOptions): boolean {
  if (NON_RENDERED_ELEMENTS.has(element.name)) return true;
  return options.stripBoilerplate === true && isBoilerplate(element);
}

function itemMarker(list: ListFrame | undefined): string {
  if (!list) return '';
  if (!list.ordered) return '• ';
  list.count += 1;
  return `${list.count}. `;
}

/**
 * Flattens parsed HTML into paragraphs. Block elements open and close a
 * paragraph; everything inline joins the current one. List items carry a
 * bullet, or their number inside `ol`, and table cells are joined with
 * ` | `. The walk keeps its own stack so deeply nested markup cannot
 * exhaust the call stack.
 */
export function htmlToText(html: string, options: RenderOptions = {}): string {
  const $ = cheerio.load(html);
  const builder = new ParagraphBuilder();
  const lists: ListFrame[] = [];
  const stack: WalkStep[] = [];
  pushChildren(stack, $.root().contents().toArray());

  let step = stack.pop();
  while (step) {
    if (step.type === 'exit') {
      const { name } = step.element;
      builder.flush();
      if (name === 'li') builder.endItem();
      if (LIST_ELEMENTS.has(name)) lists.pop();
    } else if (isText(step.node)) {
      builder.append(step.node.data);
    } else if (isTag(step.node) && !shouldSkip(step.node, options)) {
      const element = step.node;
      if (CELL_ELEMENTS.has(element.name)) builder.separate();
      if (BLOCK_ELEMENTS.has(element.name)) {
        builder.flush();
        stack.push({ type: 'exit', element });
      }
      if (LIST_ELEMENTS.has(element.name)) {
        lists.push({ ordered: element.name === 'ol', count: 0 });
      } else if (element.name === 'li') {
        builder.startItem(itemMarker(lists[lists.length - 1]));
      }
      pushChildren(stack, element.children);
    }
    step = stack.pop();
  }

  return builder.finish();
}

/** Decodes the document bytes and renders them with {@link htmlToText}. */
export function renderHtmlToText(
  htmlBytes: Uint8Array,
  encodingHint: string | undefined,
  options: RenderOptions = {}
): string {
  const { text } = decodeTextBytes(htmlBytes, encodingHint);
  return htmlToText(text, options);
}
