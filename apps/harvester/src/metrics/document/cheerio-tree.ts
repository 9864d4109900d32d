/**
 * cheerio-backed DocumentTree.
 */

import * as cheerio from 'cheerio'
import { isTag, isText } from 'domhandler'
import type { AnyNode, Element } from 'domhandler'
import { ConfigurationError } from '../errors.js'
import type { DocumentTree } from '../types.js'

// Text inside these never counts as page text.
const NON_TEXT_TAGS = new Set(['script', 'style', 'noscript', 'template'])

function walk(nodes: readonly AnyNode[], predicate: (node: Element) => boolean): Element | null {
  for (const node of nodes) {
    if (!isTag(node)) continue
    if (predicate(node)) return node

    const found = walk(node.children, predicate)
    if (found) return found
  }
  return null
}

function collectText(node: AnyNode, pieces: string[]): void {
  if (isText(node)) {
    const piece = node.data.trim()
    if (piece) pieces.push(piece)
    return
  }
  if (isTag(node)) {
    if (NON_TEXT_TAGS.has(node.tagName)) return
    for (const child of node.children) {
      collectText(child, pieces)
    }
  }
}

export class CheerioDocumentTree implements DocumentTree<Element> {
  private readonly $: cheerio.CheerioAPI

  constructor($: cheerio.CheerioAPI) {
    this.$ = $
  }

  static fromHtml(html: string): CheerioDocumentTree {
    return new CheerioDocumentTree(cheerio.load(html))
  }

  findFirst(predicate: (node: Element) => boolean): Element | null {
    return walk(this.$.root().contents().toArray(), predicate)
  }

  selectFirst(selector: string): Element | null {
    let node: AnyNode | undefined
    try {
      node = this.$.root().find(selector).first().get(0)
    } catch (error) {
      throw new ConfigurationError(`Invalid CSS selector: ${selector}`, { cause: error })
    }
    return node && isTag(node) ? node : null
  }

  nextSibling(node: Element): Element | null {
    for (let sibling = node.next; sibling; sibling = sibling.next) {
      if (isTag(sibling)) return sibling
    }
    return null
  }

  parent(node: Element): Element | null {
    const parent = node.parent
    return parent && isTag(parent) ? parent : null
  }

  text(node: Element): string {
    const pieces: string[] = []
    collectText(node, pieces)
    return pieces.join(' ')
  }

  // "<b>1</b><b>.85</b>" reads as "1.85"
  valueText(node: Element): string {
    const pieces: string[] = []
    collectText(node, pieces)
    return pieces.join('')
  }

  tagName(node: Element): string {
    return node.tagName.toLowerCase()
  }
}
