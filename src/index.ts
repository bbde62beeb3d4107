import 'dotenv/config';
import { createResearchPipeline } from './pipeline/runPipeline';

async function main(): Promise<void> {
  const substance = process.argv.slice(2).join(' ').trim();

  if (!substance) {
    console.error('Usage: npm run dev -- "<substance name>"');
    console.error('Example: npm run dev -- "Ibuprofen HCL"');
    process.exit(1);
  }

  const pipeline = createResearchPipeline();
  try {
    const result = await pipeline.run(substance);
    console.log(JSON.stringify(result, null, 2));

    if (result.status === 'error') {
      console.error('Search failed:', result.message);
      process.exitCode = 1;
    }
  } finally {
    pipeline.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { ResearchPipeline, createResearchPipeline } from './pipeline/runPipeline';
export { FileStore } from './storage/fileStore';
export { normalizeSubstanceName, createSlug } from './utils/substance';
export * from './pipeline/types';
