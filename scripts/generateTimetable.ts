// Generate a timetable from the reference collections in MongoDB
// Run with: npm run generate   (reads .env.local / .env)

import dotenv from 'dotenv';
import { dbDisconnect } from '@/lib/dbConnect';
import { loadRuntimeConfig } from '@/lib/config';
import { generateTimetable } from '@/lib/generateTimetable';
import { MongoReferenceDataSource } from '@/lib/mongoReferenceDataSource';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  try {
    const config = loadRuntimeConfig();

    const result = await generateTimetable(new MongoReferenceDataSource(config.mongodbUri), {
      sectionIds: config.sectionIds,
      timeoutSeconds: config.timeoutSeconds,
      seed: config.seed,
      onProgress: ({ assigned, total, iterations }) => {
        console.log(`   Progress: ${assigned}/${total} assigned (iteration ${iterations})`);
      },
    });

    if (result.success && result.assignment) {
      console.log(`\n✅ ${result.message}`);
      console.log(JSON.stringify(Object.fromEntries(result.assignment), null, 2));
    } else {
      console.log(`\n❌ ${result.message}`);
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('❌ Error generating timetable:', error);
    process.exitCode = 1;
  } finally {
    await dbDisconnect();
  }
}

void main();
