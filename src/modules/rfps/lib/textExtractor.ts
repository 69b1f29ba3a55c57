import pdfParse from "pdf-parse";
import { errorContext, logger } from "../../../lib/logger";

export interface TextExtractor {
  /**
   * Plain text of every page, pages separated by newlines. Throws when the
   * bytes cannot be read as a document at all.
   */
  extractText(bytes: Buffer): Promise<string>;
}

// The parts of a pdf.js page that pdf-parse hands to `pagerender`
type PdfTextItem = { str: string; transform: number[] };

interface PdfPage {
  pageIndex: number;
  getTextContent(): Promise<{ items: PdfTextItem[] }>;
}

/** Items on the same baseline stay on one line. */
function renderItems(items: PdfTextItem[]): string {
  let text = "";
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

export const pdfTextExtractor: TextExtractor = {
  async extractText(bytes) {
    const pages: string[] = [];

    const parsed = await pdfParse(bytes, {
      pagerender: async (page: PdfPage) => {
        let text = "";
        try {
          text = renderItems((await page.getTextContent()).items);
        } catch (err) {
          logger.debug("PDF page unreadable", {
            page: page.pageIndex + 1,
            ...errorContext(err),
          });
        }
        pages[page.pageIndex] = text;
        return text;
      },
    });

    // a page pdf-parse could not open never reaches pagerender
    return Array.from({ length: parsed.numrender }, (_, i) => pages[i] ?? "").join("\n");
  },
};
