import { JSDOM } from 'jsdom';

export interface DeckDocument {
  document: Document;
  serialize: () => string;
}

export function createDocument(title: string): DeckDocument {
  const dom = new JSDOM('<!DOCTYPE html><html lang="en"><head><meta charset="utf-8"></head><body></body></html>');
  const { document } = dom.window;
  const titleEl = document.createElement('title');
  titleEl.textContent = title;
  document.head.appendChild(titleEl);
  return { document, serialize: () => dom.serialize() };
}
