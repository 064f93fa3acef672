/** Maps texts to fixed-length vectors, one per input, in input order */
export interface TextEmbedder {
  readonly model: string;
  generateEmbeddings(texts: string[]): Promise<number[][]>;
}
