#!/usr/bin/env tsx

/**
 * Harvest top posts into a local JSON file
 *
 * Configuration comes from the environment (or a .env file):
 *   HARVEST_COUNT, HARVEST_OUTPUT, HARVEST_BATCH_SIZE, HARVEST_MAX_RETRIES,
 *   HARVEST_RETRY_DELAY_MS, HARVEST_NO_RESUME, HARVEST_API_BASE, LOG_LEVEL
 *
 * Usage:
 *   HARVEST_COUNT=500 tsx scripts/harvest.ts
 *   npm run harvest
 */

import dotenv from 'dotenv';
import { Harvester } from '../src/harvester';
import { configFromEnv } from '../src/config/ConfigValidator';
import { ConfigError } from '../src/utils/errors';

dotenv.config();

async function main(): Promise<number> {
  const harvester = await Harvester.init(configFromEnv(process.env));

  try {
    const result = await harvester.run();

    if (result.state === 'ABORTED') {
      console.log(`\n⚠️  Stopped early with ${result.posts.length} posts.`);
      console.log(`   Run again to resume from ${result.checkpointPath}`);
      return 2;
    }

    console.log(`\n✅ Saved ${result.posts.length} posts to ${result.outputPath}`);
    return 0;
  } finally {
    await harvester.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      error.issues.forEach((issue) => console.error(`   ${issue}`));
    } else {
      console.error('❌ Harvest failed:', error instanceof Error ? error.message : error);
      if (error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  });
