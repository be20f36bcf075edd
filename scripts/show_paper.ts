import 'dotenv/config';
import { createDatabaseClient } from '../src/db/client';

async function main(): Promise<void> {
  const paperId = Number(process.argv[2]);
  const connectionString = process.env.POSTGRES_CONNECTION_STRING;

  if (!Number.isInteger(paperId) || !connectionString) {
    console.error('Usage: npm run show <paper-id>  (POSTGRES_CONNECTION_STRING must be set)');
    process.exit(1);
  }

  const db = createDatabaseClient(connectionString);
  try {
    const paper = await db.getPaperById(paperId);
    if (!paper) {
      console.log(`Paper ${paperId} not found`);
      return;
    }

    console.log('='.repeat(80));
    console.log('PAPER INFORMATION');
    console.log('='.repeat(80));
    console.log(`ID: ${paper.id}`);
    console.log(`Title: ${paper.title}`);
    console.log(`Authors: ${(paper.authors ?? []).join(', ')}`);
    console.log(`Keywords: ${(paper.keywords ?? []).join(', ')}`);
    console.log(`\nAbstract:\n${paper.abstract ?? ''}`);
    console.log(`\nPDF URL: ${paper.pdf_url}`);
    console.log(`Created: ${paper.created_at.toISOString()}`);

    const sections = await db.getPaperSections(paperId);

    console.log('\n' + '='.repeat(80));
    console.log('SECTIONS');
    console.log('='.repeat(80));

    for (const section of sections) {
      console.log(`\n### ${section.section_title}`);
      console.log(`\nSummary:\n${section.summary ?? ''}`);

      if (section.key_points?.length) {
        console.log('\nKey Points:');
        for (const point of section.key_points) {
          console.log(`  - ${point}`);
        }
      }

      if (section.methodologies?.length) {
        console.log('\nMethodologies:');
        for (const method of section.methodologies) {
          console.log(`  - ${method.name}: ${method.description}`);
        }
      }

      if (section.results?.length) {
        console.log('\nResults:');
        for (const result of section.results) {
          console.log(`  - ${result.finding}`);
          console.log(`    Significance: ${result.significance}`);
        }
      }

      if (section.citations?.length) {
        console.log(`\nCitations: ${section.citations.length} references`);
      }

      console.log('\n' + '-'.repeat(80));
    }
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  console.error('Failed to show paper:', error);
  process.exit(1);
});
