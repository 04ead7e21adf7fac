/**
 * Match CLI
 *
 * Reads one match request (JSON) and prints the ranked candidates.
 *
 * Run (from repo root): npm run match -- fixtures/sample-match-request.json
 */

import './load-env';
import * as fs from 'fs';
import * as path from 'path';
import { APP_NAME } from '@matchgraph/core';
import { OllamaModels, defaultClient } from '@matchgraph/llm';
import { createMatchPipeline, loadMatchingConfig } from '@matchgraph/agents';

async function main() {
  const requestPath = process.argv[2];
  if (!requestPath) {
    console.error('Usage: npm run match -- <request.json>');
    process.exit(1);
  }

  const absolutePath = path.resolve(process.cwd(), requestPath);
  if (!fs.existsSync(absolutePath)) {
    console.error('Request file not found:', absolutePath);
    process.exit(1);
  }

  const config = loadMatchingConfig();
  const input: unknown = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));

  const ollamaUp = await defaultClient.isAvailable(OllamaModels.EMBED);
  console.log(
    `${APP_NAME}: reason backend=${config.reason.mode}, embeddings=${OllamaModels.EMBED} (${ollamaUp ? 'available' : 'unavailable'})`,
  );

  const { agent, retriever } = createMatchPipeline(config);
  await retriever.warmUp();

  const result = await agent.execute(input);
  if (!result.success || !result.data) {
    console.error('Matching failed:', result.error ?? 'unknown error');
    process.exit(1);
  }

  console.log(JSON.stringify(result.data, null, 2));
  console.log(`\n${result.data.length} match(es) in ${result.duration}ms`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
