import { NodeHtmlParserDetector } from "../node-html-parser-detector"

describe("NodeHtmlParserDetector", () => {
  const detector = new NodeHtmlParserDetector()

  it.each([
    ["plain words", "Meeting moved to 3pm."],
    ["a single bare paragraph", "<p>Just a paragraph</p>"],
    ["comparison operators", "a < b and c > d"],
  ])("finds no markup in %s", (_label, text) => {
    expect(detector.containsMarkup(text)).toBe(false)
  })

  it.each([
    ["nested tags", "<p>Hello <b>world</b></p>"],
    ["a single non-paragraph tag", "<h1>Title</h1>"],
    ["two paragraphs", "<p>one</p><p>two</p>"],
    ["a link", 'Read <a href="https://example.com">this</a>'],
  ])("finds markup in %s", (_label, text) => {
    expect(detector.containsMarkup(text)).toBe(true)
  })
})
