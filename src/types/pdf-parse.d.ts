// pdf-parse ships no types, and @types/pdf-parse covers only the package entry
// point, not the library file loaded here.
declare module "pdf-parse/lib/pdf-parse.js" {
  export interface PdfTextItem {
    str: string;
    transform: number[];
  }

  export interface PdfPage {
    /** Zero-based. */
    pageIndex: number;
    getTextContent(options: {
      normalizeWhitespace: boolean;
      disableCombineTextItems: boolean;
    }): Promise<{ items: PdfTextItem[] }>;
  }

  export interface PdfParseOptions {
    pagerender?: (page: PdfPage) => Promise<string> | string;
    max?: number;
  }

  export interface PdfParseResult {
    numpages: number;
    numrender: number;
    text: string;
  }

  export default function pdfParse(
    dataBuffer: Buffer,
    options?: PdfParseOptions,
  ): Promise<PdfParseResult>;
}
