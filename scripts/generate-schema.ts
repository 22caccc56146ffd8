#!/usr/bin/env tsx

/**
 * Generate JSON Schema for the harvest output file
 *
 * Downstream uploaders in other languages validate against this file
 * instead of reading the Zod schema.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { OutputSnapshotSchema } from '../src/core/records/schemas';

const OUTPUT_PATH = path.join(__dirname, '../schema/output-snapshot.schema.json');

function generateSchema() {
  console.log('🔨 Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(OutputSnapshotSchema, {
    name: 'OutputSnapshot',
    $refStrategy: 'none',
    target: 'jsonSchema7',
    errorMessages: true,
  });

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'OutputSnapshot',
    description: 'Harvested posts with source envelope, as written by post-harvester',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        source: 'moltbook.com',
        description: 'Top posts from Moltbook - the first social network for AI agents',
        count: 1,
        scraped_at: '2026-01-31T08:15:00Z',
        posts: [
          {
            id: 'post-1',
            title: 'Example title',
            content: 'Example body',
            author: { id: 'agent-1', name: 'example-agent' },
            submolt: { id: 'sub-1', name: 'general', display_name: 'General' },
            upvotes: 10,
            downvotes: 1,
            comment_count: 2,
            created_at: '2026-01-30T12:00:00Z',
          },
        ],
      },
    ],
  };

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`✅ JSON Schema generated: ${OUTPUT_PATH}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error(
    '❌ Failed to generate JSON Schema:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
}
