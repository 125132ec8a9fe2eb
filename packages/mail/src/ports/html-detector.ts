export interface HtmlDetector {
  /** True when the text holds markup beyond a single bare paragraph. */
  containsMarkup(text: string): boolean
}
