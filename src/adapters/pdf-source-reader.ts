/**
 * Agreement reader backed by pdf.js
 */

import fs from "fs";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFPageProxy } from "pdfjs-dist";
import type { TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";
import type { SourceDocumentReader, SourceDocumentText } from "../types";
import type { LayoutOptions, PositionedText } from "./page-text";
import { buildSourceText } from "./page-text";

export interface PdfReaderOptions extends LayoutOptions {
  headerCropHeight: number;
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return "str" in item;
}

async function readPageItems(page: PDFPageProxy): Promise<PositionedText[]> {
  const content = await page.getTextContent();
  // view is the media box [x0, y0, x1, y1] in pdf units, origin bottom-left
  const [left = 0, , , pageTop = 0] = page.view;

  return content.items.filter(isTextItem).map((item) => {
    const originX = Number(item.transform[4]);
    const baseline = Number(item.transform[5]);
    return {
      text: item.str,
      x: originX - left,
      top: pageTop - baseline - item.height,
      width: item.width,
      height: item.height,
    };
  });
}

export class PdfSourceReader implements SourceDocumentReader {
  constructor(private readonly options: PdfReaderOptions) {}

  async read(filePath: string): Promise<SourceDocumentText> {
    const data = new Uint8Array(await fs.promises.readFile(filePath));
    const pdf = await getDocument({
      data,
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    }).promise;

    try {
      const pages: PositionedText[][] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        pages.push(await readPageItems(page));
        page.cleanup();
      }
      return buildSourceText(pages, this.options);
    } finally {
      await pdf.destroy();
    }
  }
}
