import { getDocumentProxy } from "unpdf";
import { ExtractionError, errorMessage } from "../errors.js";
import type { ExtractedDocument } from "./types.js";

export async function extractPdf(data: Uint8Array, fileName: string): Promise<ExtractedDocument> {
  let pages: string[];
  let numPages: number;
  try {
    const pdf = await getDocumentProxy(data);
    numPages = pdf.numPages;
    pages = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      const text = textContent.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");
      pages.push(text.trim());
    }
  } catch (err) {
    throw new ExtractionError(`Failed to read PDF ${fileName}: ${errorMessage(err)}`, { source: fileName });
  }

  const text = pages.filter((p) => p.length > 0).join("\n\n");
  if (!text) {
    throw new ExtractionError(`No text content could be extracted from ${fileName}`, { source: fileName });
  }

  return {
    text,
    title: fileName.replace(/\.pdf$/i, ""),
    source: fileName,
    metadata: { pages: String(numPages) },
  };
}
