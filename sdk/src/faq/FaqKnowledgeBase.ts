import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ChainError, IngestionError, RetrievalError } from '../types';
import type {
  FaqIngestResult,
  FaqMatch,
  FaqRecord,
  Logger,
  VectorStore,
} from '../types';
import { ConsoleLogger } from '../utils/ConsoleLogger';

const faqRowSchema = z.object({
  question: z.string().trim().min(1, 'question is empty'),
  answer: z.string().trim(),
});

export interface FaqKnowledgeBaseConfig {
  store: VectorStore;
  /**
   * @default 'faqs'
   */
  collection?: string;
  logger?: Logger;
}

/**
 * FAQ question/answer pairs kept in a vector store collection.
 * Questions are embedded; answers ride along as metadata.
 */
export class FaqKnowledgeBase {
  private store: VectorStore;
  private collection: string;
  private logger: Logger;

  constructor(config: FaqKnowledgeBaseConfig) {
    this.store = config.store;
    this.collection = config.collection || 'faqs';
    this.logger = config.logger || new ConsoleLogger();
  }

  get collectionName(): string {
    return this.collection;
  }

  /**
   * Load a question,answer CSV into the collection.
   * Does nothing when the collection already exists. A failed load drops
   * the half-built collection so the next call starts over.
   */
  async ingest(path: string): Promise<FaqIngestResult> {
    if (await this.store.hasCollection(this.collection)) {
      this.logger.debug(`FAQ collection "${this.collection}" exists, skipping ingestion`);
      return { collection: this.collection, indexed: 0, skipped: true };
    }

    const records = parseFaqCsv(await readCsv(path));

    this.logger.info(`Ingesting ${records.length} FAQ records into "${this.collection}"`);

    try {
      await this.store.createCollection(this.collection);
      await this.store.add(
        this.collection,
        records.map((record, idx) => ({
          id: `faq_${idx}`,
          document: record.question,
          metadata: { answer: record.answer },
        }))
      );
    } catch (error) {
      if (this.store.dropCollection) {
        await this.store.dropCollection(this.collection);
      }
      throw new IngestionError(
        `cannot index "${this.collection}": ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    this.logger.info(`FAQ data ingested into collection: ${this.collection}`);

    return { collection: this.collection, indexed: records.length, skipped: false };
  }

  /**
   * Nearest FAQ records for the query text
   */
  async query(text: string, k: number): Promise<FaqMatch[]> {
    try {
      const matches = await this.store.query(this.collection, text, k);
      return matches.map((match) => ({
        id: match.id,
        question: match.document,
        answer: match.metadata.answer ?? '',
        score: match.score,
      }));
    } catch (error) {
      if (error instanceof ChainError) {
        throw error;
      }
      throw new RetrievalError(error instanceof Error ? error.message : 'Unknown error', error);
    }
  }
}

/**
 * Parse CSV text with a question,answer header into FAQ records
 */
export function parseFaqCsv(csv: string): FaqRecord[] {
  let rows: unknown;
  try {
    rows = parse(csv, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new IngestionError(error instanceof Error ? error.message : 'Invalid CSV');
  }

  const result = z.array(faqRowSchema).safeParse(rows);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `row ${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new IngestionError(issues);
  }

  return result.data;
}

async function readCsv(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new IngestionError(
      `cannot read ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}
