/**
 * Produces a short summary of a piece of text.
 */
export interface Summarizer {
  summarize(text: string): Promise<string>;
}
