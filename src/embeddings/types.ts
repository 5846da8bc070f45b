/** Maps text to a vector; every vector it returns has length `dimensions` */
export interface EmbeddingsProvider {
  embed(text: string): Promise<number[]>;
  readonly dimensions: number;
}
