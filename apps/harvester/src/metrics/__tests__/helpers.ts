import type { Element } from 'domhandler'
import { CheerioDocumentTree } from '../document/cheerio-tree.js'
import type { PageFetcher } from '../types.js'

/**
 * Serves HTML pages in order; the last page repeats.
 */
export class StubPageFetcher implements PageFetcher<Element> {
  readonly calls: string[] = []
  private readonly pages: string[]

  constructor(...pages: string[]) {
    this.pages = pages
  }

  async fetch(url: string): Promise<CheerioDocumentTree> {
    const index = Math.min(this.calls.length, this.pages.length - 1)
    this.calls.push(url)
    return CheerioDocumentTree.fromHtml(this.pages[index] ?? '')
  }
}

export class FailingPageFetcher implements PageFetcher<Element> {
  readonly calls: string[] = []
  private readonly error: unknown

  constructor(error: unknown) {
    this.error = error
  }

  async fetch(url: string): Promise<CheerioDocumentTree> {
    this.calls.push(url)
    throw this.error
  }
}

export function tree(html: string): CheerioDocumentTree {
  return CheerioDocumentTree.fromHtml(html)
}
