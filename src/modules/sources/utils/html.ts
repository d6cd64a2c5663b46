import { JSDOM } from 'jsdom';

export function withDocument<T>(html: string, read: (document: Document) => T): T {
  const dom = new JSDOM(html);
  try {
    return read(dom.window.document);
  } finally {
    dom.window.close();
  }
}

export function selectText(root: ParentNode, selector?: string | null): string | null {
  if (!selector) return null;
  const element = root.querySelector(selector);
  if (!element) return null;
  return (element.textContent ?? '').trim();
}

export function selectAttribute(root: ParentNode, selector: string | null | undefined, attribute: string) {
  if (!selector) return null;
  return root.querySelector(selector)?.getAttribute(attribute) ?? null;
}
