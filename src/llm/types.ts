export interface EmbeddingProvider {
  /** Returns one vector per input text, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface ClassificationProvider {
  /** Returns the raw text content of the model's reply. */
  complete(systemPrompt: string, userText: string): Promise<string>;
}
