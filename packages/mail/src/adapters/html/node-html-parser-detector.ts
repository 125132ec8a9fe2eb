import { HTMLElement, type Node, parse } from "node-html-parser"
import type { HtmlDetector } from "../../ports/html-detector"

/**
 * Markup detection with node-html-parser. Text with no elements, or with
 * one `<p>` and nothing else, counts as plain.
 */
export class NodeHtmlParserDetector implements HtmlDetector {
  containsMarkup(text: string): boolean {
    const elements = collectElementTags(parse(text))

    if (elements.length === 0) return false
    if (elements.length === 1 && elements[0] === "P") return false

    return true
  }
}

function collectElementTags(node: Node): string[] {
  const tags: string[] = []

  for (const child of node.childNodes) {
    if (child instanceof HTMLElement) tags.push(child.tagName)
    tags.push(...collectElementTags(child))
  }

  return tags
}
