import { Pool } from 'pg';
import { z } from 'zod';
import { PersistenceFailure } from '../agents/errors';
import {
  FigureOrTableSchema,
  MethodologySchema,
  OutlineSchema,
  ResultSchema,
  type FigureOrTable,
  type Methodology,
  type Outline,
  type Result,
} from '../agents/schemas';
import { silentLogger, type Logger } from '../utils/logger';
import {
  CORE_SCHEMA,
  INSERT_PAPER,
  INSERT_PAPER_SECTION,
  REPORTING_SCHEMA,
  SELECT_PAPER_BY_ID,
  SELECT_PAPER_OVERVIEW,
  SELECT_PAPER_SECTIONS,
} from './queries';

/** The slice of a pooled `pg` connection the client relies on. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  release(err?: Error | boolean): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

const textArray = z.array(z.string()).nullable();

export const PaperRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  authors: textArray,
  abstract: z.string().nullable(),
  keywords: textArray,
  pdf_url: z.string(),
  outline: OutlineSchema,
  created_at: z.date(),
});

export type Paper = z.infer<typeof PaperRowSchema>;

export const PaperSectionRowSchema = z.object({
  id: z.number().int(),
  paper_id: z.number().int(),
  section_title: z.string(),
  section_description: z.string().nullable(),
  subsections: textArray,
  summary: z.string().nullable(),
  key_points: textArray,
  methodologies: z.array(MethodologySchema).nullable(),
  results: z.array(ResultSchema).nullable(),
  figures_and_tables: z.array(FigureOrTableSchema).nullable(),
  citations: textArray,
  created_at: z.date(),
});

export type PaperSection = z.infer<typeof PaperSectionRowSchema>;

export const PaperOverviewRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  authors: textArray,
  keywords: textArray,
  section_count: z.number().int(),
  created_at: z.date(),
});

export type PaperOverview = z.infer<typeof PaperOverviewRowSchema>;

const InsertedIdSchema = z.object({ id: z.number().int() });

export interface InsertPaper {
  title: string;
  authors: string[];
  abstract: string;
  keywords: string[];
  pdf_url: string;
  outline: Outline;
}

export interface InsertPaperSection {
  section_title: string;
  section_description: string;
  subsections: string[];
  summary: string;
  key_points: string[];
  methodologies: Methodology[];
  results: Result[];
  figures_and_tables: FigureOrTable[];
  citations: string[];
}

export class DatabaseClient {
  constructor(
    private readonly pool: SqlPool,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Creates the papers and paper_sections tables and their index if missing. */
  async ensureSchema(): Promise<void> {
    await this.withClient('create schema', async (client) => {
      for (const statement of CORE_SCHEMA) {
        await client.query(statement);
      }
    });
  }

  /** Core schema plus the reporting indexes and `paper_overview` view. */
  async runMigrations(): Promise<void> {
    await this.ensureSchema();
    await this.withClient('apply reporting schema', async (client) => {
      for (const statement of REPORTING_SCHEMA) {
        await client.query(statement);
      }
    });
  }

  /**
   * Writes one paper row and its section rows in a single transaction and
   * returns the generated paper id. Nothing persists if any insert fails.
   */
  async insertPaperWithSections(
    paper: InsertPaper,
    sections: InsertPaperSection[]
  ): Promise<number> {
    return this.withTransaction('insert paper', async (client) => {
      const inserted = await client.query(INSERT_PAPER, [
        paper.title,
        paper.authors,
        paper.abstract,
        paper.keywords,
        paper.pdf_url,
        JSON.stringify(paper.outline),
      ]);
      const { id: paperId } = InsertedIdSchema.parse(inserted.rows[0]);

      for (const section of sections) {
        await client.query(INSERT_PAPER_SECTION, [
          paperId,
          section.section_title,
          section.section_description,
          section.subsections,
          section.summary,
          section.key_points,
          // jsonb columns take JSON text; pg would send arrays as TEXT[] literals
          JSON.stringify(section.methodologies),
          JSON.stringify(section.results),
          JSON.stringify(section.figures_and_tables),
          section.citations,
        ]);
      }

      return paperId;
    });
  }

  async getPaperById(paperId: number): Promise<Paper | null> {
    return this.withClient('get paper', async (client) => {
      const { rows } = await client.query(SELECT_PAPER_BY_ID, [paperId]);
      return rows.length > 0 ? PaperRowSchema.parse(rows[0]) : null;
    });
  }

  async getPaperSections(paperId: number): Promise<PaperSection[]> {
    return this.withClient('get paper sections', async (client) => {
      const { rows } = await client.query(SELECT_PAPER_SECTIONS, [paperId]);
      return rows.map((row) => PaperSectionRowSchema.parse(row));
    });
  }

  async listPapers(limit = 50): Promise<PaperOverview[]> {
    return this.withClient('list papers', async (client) => {
      const { rows } = await client.query(SELECT_PAPER_OVERVIEW, [limit]);
      return rows.map((row) => PaperOverviewRowSchema.parse(row));
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withClient<T>(
    operation: string,
    fn: (client: SqlClient) => Promise<T>
  ): Promise<T> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceFailure(operation, error);
    }

    try {
      return await fn(client);
    } catch (error) {
      throw error instanceof PersistenceFailure ? error : new PersistenceFailure(operation, error);
    } finally {
      client.release();
    }
  }

  private async withTransaction<T>(
    operation: string,
    fn: (client: SqlClient) => Promise<T>
  ): Promise<T> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceFailure(operation, error);
    }

    let brokenConnection: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        brokenConnection =
          rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        this.logger.error(`Rollback failed during ${operation}`, {
          error: brokenConnection.message,
        });
      }
      throw new PersistenceFailure(operation, error);
    } finally {
      // a connection that could not roll back is destroyed, not reused
      client.release(brokenConnection);
    }
  }
}

export function createPgPool(connectionString: string): SqlPool {
  const pool = new Pool({ connectionString });
  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

export function createDatabaseClient(connectionString: string, logger?: Logger): DatabaseClient {
  return new DatabaseClient(createPgPool(connectionString), logger);
}
