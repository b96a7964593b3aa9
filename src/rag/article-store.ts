import { randomUUID } from "node:crypto";
import { PersistenceError, errorMessage } from "../errors.js";
import type { ExtractedDocument } from "./types.js";
import { extractUrl } from "./url-extractor.js";

export interface NewArticle {
  title: string;
  content: string;
  url: string;
  isPublished: boolean;
  saved: boolean;
}

export interface Article extends NewArticle {
  id: string;
  createdAt: string;
  updatedAt: string;
}

/** Where imported articles go. The service ships an in-memory store; a database-backed one plugs in here. */
export interface ArticleStore {
  insert(article: NewArticle): Promise<Article>;
  get(id: string): Promise<Article | undefined>;
}

export class InMemoryArticleStore implements ArticleStore {
  private readonly articles = new Map<string, Article>();

  async insert(article: NewArticle): Promise<Article> {
    const now = new Date().toISOString();
    const stored: Article = { ...article, id: randomUUID(), createdAt: now, updatedAt: now };
    this.articles.set(stored.id, stored);
    return stored;
  }

  async get(id: string): Promise<Article | undefined> {
    return this.articles.get(id);
  }
}

export type UrlExtractor = (url: string) => Promise<ExtractedDocument>;

export async function importArticle(
  url: string,
  store: ArticleStore,
  extract: UrlExtractor = extractUrl,
): Promise<Article> {
  const doc = await extract(url);

  try {
    return await store.insert({
      title: doc.title,
      content: doc.text,
      url,
      isPublished: false,
      saved: true,
    });
  } catch (err) {
    throw new PersistenceError(`Failed to insert article into storage: ${errorMessage(err)}`, { url });
  }
}
