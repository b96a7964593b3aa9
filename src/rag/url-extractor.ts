import { ExtractionError, errorMessage, isAbortError } from "../errors.js";
import { RAG_CONFIG } from "./config.js";
import { extractPdf } from "./pdf-extractor.js";
import type { ExtractedDocument } from "./types.js";

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (!entity.startsWith("#")) {
      return ENTITIES[entity.toLowerCase()] ?? match;
    }
    const hex = entity[1] === "x" || entity[1] === "X";
    const codePoint = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
    // Out-of-range references stay as written.
    return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
  });
}

function metaContent(html: string, property: string): string | undefined {
  const pattern = new RegExp(
    `<meta[^>]+(?:property|name)=["']${property}["'][^>]*content=["']([^"']*)["']`,
    "i",
  );
  const value = pattern.exec(html)?.[1]?.trim();
  return value ? decodeEntities(value) : undefined;
}

/**
 * Best-effort readable text from an HTML page: drops scripts, styles and
 * page chrome, turns block boundaries into line breaks, collapses whitespace.
 */
export function htmlToDocument(html: string, url: string): ExtractedDocument {
  const rawTitle = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1];
  const title =
    (rawTitle ? decodeEntities(rawTitle).replace(/\s+/g, " ").trim() : "") ||
    metaContent(html, "og:site_name") ||
    "Untitled Article";

  const text = decodeEntities(
    html
      .replace(/<!--[\s\S]*?-->/g, " ")
      .replace(/<(script|style|noscript|template|svg|head|nav|footer)\b[\s\S]*?<\/\1>/gi, " ")
      .replace(/\s+/g, " ")
      .replace(/<\/?(p|div|br|li|h[1-6]|tr|section|article|blockquote)\b[^>]*>/gi, "\n")
      .replace(/<[^>]+>/g, " "),
  )
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");

  const metadata: Record<string, string> = { url };
  const description = metaContent(html, "description");
  if (description) metadata["description"] = description;
  const published = metaContent(html, "article:published_time");
  if (published) metadata["date"] = published;

  return { text, title, source: url, metadata };
}

export async function extractUrl(url: string, signal?: AbortSignal): Promise<ExtractedDocument> {
  const timeout = AbortSignal.timeout(RAG_CONFIG.extractionTimeoutMs);

  let res: Response;
  try {
    res = await fetch(url, {
      headers: { Accept: "text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8" },
      redirect: "follow",
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
  } catch (err) {
    throw new ExtractionError(
      isAbortError(err)
        ? `Timed out downloading content from URL: ${url}`
        : `Failed to download content from URL: ${url} (${errorMessage(err)})`,
      { url },
    );
  }

  if (!res.ok) {
    throw new ExtractionError(`Failed to download content from URL: ${url} (status ${res.status})`, {
      url,
      status: res.status,
    });
  }

  const contentType = res.headers.get("content-type") ?? "";
  if (contentType.includes("application/pdf") || /\.pdf($|\?)/i.test(url)) {
    const buffer = new Uint8Array(await res.arrayBuffer());
    const fileName = new URL(url).pathname.split("/").pop() || "document.pdf";
    const doc = await extractPdf(buffer, fileName);
    return { ...doc, source: url, metadata: { ...doc.metadata, url } };
  }

  const doc = htmlToDocument(await res.text(), url);
  if (!doc.text) {
    throw new ExtractionError("No text content could be extracted from the URL", { url });
  }
  return doc;
}
