export interface TextExtractor {
  readonly name: string;
  /** Text of the first `maxPages` pages of the PDF at `filePath`. May throw. */
  extract(filePath: string, maxPages: number): Promise<string>;
}
