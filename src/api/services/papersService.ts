import type { DatabaseClient, Paper, PaperOverview, PaperSection } from '../../db/client';

export interface PaperWithSections {
  paper: Paper;
  sections: PaperSection[];
}

export type PapersStore = Pick<DatabaseClient, 'getPaperById' | 'getPaperSections' | 'listPapers'>;

export class PapersService {
  constructor(private db: PapersStore) {}

  async listPapers(limit: number = 50): Promise<PaperOverview[]> {
    return this.db.listPapers(limit);
  }

  async getPaperWithSections(paperId: number): Promise<PaperWithSections | null> {
    const paper = await this.db.getPaperById(paperId);
    if (!paper) {
      return null;
    }
    const sections = await this.db.getPaperSections(paperId);
    return { paper, sections };
  }
}
