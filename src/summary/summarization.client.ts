/**
 * Text generation backend used to summarize a prompt. Implementations reject
 * with SummarizationError only.
 */
export abstract class SummarizationClient {
  abstract summarize(prompt: string): Promise<string>;
}
