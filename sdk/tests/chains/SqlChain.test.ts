import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SqlChain, SQL_CHAIN_ERROR_MESSAGE } from '../../src/chains/SqlChain';
import { NO_PRODUCTS_MESSAGE, RESULT_NARRATION_PROMPT, SQL_GENERATION_PROMPT } from '../../src/prompts';
import { SQLiteProductStore } from '../../src/storage/SQLiteProductStore';
import { GenerationError, ServiceError, UnsafeSQLError } from '../../src/types';
import type { QueryRow, RelationalStore } from '../../src/types';
import { createFakeLogger, createFakeModel, createProductDb, SAMPLE_PRODUCTS } from '../helpers';

const PUMA_SQL = "SELECT * FROM product WHERE LOWER(brand) LIKE LOWER('%puma%') LIMIT 3";

describe('SqlChain', () => {
  let db: { path: string; cleanup: () => void };
  let store: SQLiteProductStore;
  let logger: ReturnType<typeof createFakeLogger>;

  beforeEach(() => {
    db = createProductDb();
    store = new SQLiteProductStore(db.path);
    logger = createFakeLogger();
  });

  afterEach(() => {
    db.cleanup();
  });

  describe('generateSQL', () => {
    it('should send the schema prompt and the question', async () => {
      const model = createFakeModel(`<SQL>${PUMA_SQL}</SQL>`);
      const chain = new SqlChain({ model, store, logger });

      const sql = await chain.generateSQL('Show Puma shoes');

      expect(sql).toBe(PUMA_SQL);
      expect(model.complete).toHaveBeenCalledWith([
        { role: 'system', content: SQL_GENERATION_PROMPT },
        { role: 'user', content: 'Show Puma shoes' },
      ]);
    });

    it('should fail with GenerationError when the reply has no SQL tags', async () => {
      const chain = new SqlChain({ model: createFakeModel('I cannot help with that.'), store, logger });

      await expect(chain.generateSQL('Show Puma shoes')).rejects.toThrow(
        new GenerationError('model failed to produce SQL')
      );
    });

    it('should fail with UnsafeSQLError for destructive statements', async () => {
      const chain = new SqlChain({
        model: createFakeModel('<SQL>DROP TABLE product</SQL>'),
        store,
        logger,
      });

      await expect(chain.generateSQL('Remove everything')).rejects.toBeInstanceOf(UnsafeSQLError);
    });

    it('should log the SQL only in debug mode', async () => {
      const quiet = new SqlChain({ model: createFakeModel(`<SQL>${PUMA_SQL}</SQL>`), store, logger });
      await quiet.generateSQL('Show Puma shoes');
      expect(logger.debug).not.toHaveBeenCalled();

      const verbose = new SqlChain({
        model: createFakeModel(`<SQL>${PUMA_SQL}</SQL>`),
        store,
        logger,
        debug: true,
      });
      await verbose.generateSQL('Show Puma shoes');
      expect(logger.debug).toHaveBeenCalledWith('Generated SQL', { sql: PUMA_SQL });
    });

    it('should apply the statement policy when configured', async () => {
      const sql = "SELECT * FROM product WHERE title LIKE '%updated%'";
      const chain = new SqlChain({
        model: createFakeModel(`<SQL>${sql}</SQL>`),
        store,
        logger,
        safety: 'statement',
      });

      await expect(chain.generateSQL('Show updated products')).resolves.toBe(sql);
    });
  });

  describe('runSQL', () => {
    it('should return exactly the matching rows with every column', async () => {
      const chain = new SqlChain({ model: createFakeModel(), store, logger });

      const rows = await chain.runSQL(PUMA_SQL);

      expect(rows).toEqual([SAMPLE_PRODUCTS[0], SAMPLE_PRODUCTS[2]]);
    });
  });

  describe('narrateResults', () => {
    it('should short-circuit empty results without calling the model', async () => {
      const model = createFakeModel();
      const chain = new SqlChain({ model, store, logger });

      await expect(chain.narrateResults('Show Adidas shoes', [])).resolves.toBe(NO_PRODUCTS_MESSAGE);
      expect(model.complete).not.toHaveBeenCalled();
    });

    it('should send the question and the rows as JSON', async () => {
      const model = createFakeModel('1. Puma Runner Shoes: Rs. 2499 (35% off)');
      const chain = new SqlChain({ model, store, logger });
      const rows: QueryRow[] = [{ title: 'Puma Runner Shoes', price: 2499 }];

      const text = await chain.narrateResults('Show Puma shoes', rows);

      expect(text).toBe('1. Puma Runner Shoes: Rs. 2499 (35% off)');
      expect(model.complete).toHaveBeenCalledWith([
        { role: 'system', content: RESULT_NARRATION_PROMPT },
        {
          role: 'user',
          content: 'QUESTION: Show Puma shoes\nDATA: [{"title":"Puma Runner Shoes","price":2499}]',
        },
      ]);
    });
  });

  describe('run', () => {
    it('should generate, execute and narrate', async () => {
      const model = createFakeModel(`<SQL>${PUMA_SQL}</SQL>`, 'Two Puma products found.');
      const chain = new SqlChain({ model, store, logger });

      const result = await chain.run('Show Puma shoes');

      expect(result).toEqual({ ok: true, text: 'Two Puma products found.' });
      expect(model.complete).toHaveBeenCalledTimes(2);
      const narration = model.complete.mock.calls[1][0][1].content;
      expect(narration).toBe(
        `QUESTION: Show Puma shoes\nDATA: ${JSON.stringify([SAMPLE_PRODUCTS[0], SAMPLE_PRODUCTS[2]])}`
      );
    });

    it('should return the sentinel when no products match', async () => {
      const model = createFakeModel("<SQL>SELECT * FROM product WHERE brand = 'Adidas'</SQL>");
      const chain = new SqlChain({ model, store, logger });

      await expect(chain.invoke('Show Adidas shoes')).resolves.toBe(NO_PRODUCTS_MESSAGE);
      expect(model.complete).toHaveBeenCalledTimes(1);
    });

    it('should reject unsafe SQL before touching the store', async () => {
      const query = vi.fn<RelationalStore['query']>();
      const chain = new SqlChain({
        model: createFakeModel('<SQL>SELECT * FROM product; DROP TABLE product</SQL>'),
        store: { query },
        logger,
      });

      const result = await chain.run('Delete the catalogue');

      expect(result).toEqual({ ok: false, kind: 'unsafe_sql', text: SQL_CHAIN_ERROR_MESSAGE });
      expect(query).not.toHaveBeenCalled();
    });

    it('should report generation failures as the apology', async () => {
      const chain = new SqlChain({ model: createFakeModel('no sql here'), store, logger });

      await expect(chain.run('Show shoes')).resolves.toEqual({
        ok: false,
        kind: 'generation',
        text: SQL_CHAIN_ERROR_MESSAGE,
      });
    });

    it('should report execution failures without leaking the driver message', async () => {
      const chain = new SqlChain({
        model: createFakeModel('<SQL>SELECT * FROM missing_table</SQL>'),
        store,
        logger,
      });

      const result = await chain.run('Show shoes');

      expect(result).toEqual({ ok: false, kind: 'execution', text: SQL_CHAIN_ERROR_MESSAGE });
      expect(result.text).not.toContain('missing_table');
      expect(logger.error).toHaveBeenCalledWith(
        'sql chain failed: SQL execution failed: no such table: missing_table',
        expect.objectContaining({ kind: 'execution', error: 'ExecutionError' })
      );
    });

    it('should report model failures during narration', async () => {
      const model = createFakeModel(`<SQL>${PUMA_SQL}</SQL>`);
      model.complete.mockRejectedValueOnce(new ServiceError('rate limited'));
      const chain = new SqlChain({ model, store, logger });

      await expect(chain.run('Show Puma shoes')).resolves.toEqual({
        ok: false,
        kind: 'service',
        text: SQL_CHAIN_ERROR_MESSAGE,
      });
    });

    it('should map unexpected errors to the apology', async () => {
      const chain = new SqlChain({
        model: createFakeModel(`<SQL>${PUMA_SQL}</SQL>`),
        store: {
          query: async () => {
            throw new TypeError('boom');
          },
        },
        logger,
      });

      await expect(chain.invoke('Show Puma shoes')).resolves.toBe(SQL_CHAIN_ERROR_MESSAGE);
    });

    it('should not let one failure affect the next request', async () => {
      const model = createFakeModel('garbage', `<SQL>${PUMA_SQL}</SQL>`, 'Two Puma products found.');
      const chain = new SqlChain({ model, store, logger });

      await expect(chain.invoke('first')).resolves.toBe(SQL_CHAIN_ERROR_MESSAGE);
      await expect(chain.invoke('second')).resolves.toBe('Two Puma products found.');
    });
  });
});
