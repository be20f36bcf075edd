import type { ExtractionBackend } from '../agents/backend';
import type { StageSettings } from '../config/appConfig';
import type { DatabaseClient } from '../db/client';
import type { DocumentSource } from '../ingest/pdf/download';
import type { LaneLimiter } from '../utils/limiter';
import type { Logger } from '../utils/logger';

/** Collaborators every extraction stage receives explicitly. */
export interface StageDeps {
  backend: ExtractionBackend;
  documents: DocumentSource;
  settings: StageSettings;
  limiter?: LaneLimiter;
  logger?: Logger;
}

export type PipelineStage = 'outlining' | 'expanding' | 'persisting';

export interface PipelineDeps extends StageDeps {
  db: DatabaseClient;
  onStageChange?: (stage: PipelineStage) => void;
}

/** The minimal slice of an outline one expansion needs. */
export interface SectionTask {
  pdf_url: string;
  title: string;
  description: string;
}

export interface PersistenceSummary {
  paper_id: number;
  status: 'success';
  title: string;
  sections_written: number;
  total_authors: number;
  total_keywords: number;
}
