/**
 * Manual check for a single endpoint
 * Usage: tsx scripts/test-endpoint.ts [endpoint name]
 */

import { appConfig } from '../src/config/app.ts';
import { loadEndpoints } from '../src/config/endpoints.ts';
import { EndpointFetcher } from '../src/core/fetching/EndpointFetcher.ts';
import { logger } from '../src/services/logger/index.ts';

async function main() {
  const wanted = process.argv[2];

  console.log('🏋️  Endpoint Fetch Test\n');

  const endpoints = await loadEndpoints(appConfig.endpoints, logger);
  const targets = wanted ? endpoints.filter((endpoint) => endpoint.name === wanted) : endpoints;

  if (targets.length === 0) {
    console.error(`❌ No endpoint named "${wanted}" in config`);
    process.exit(1);
  }

  const fetcher = new EndpointFetcher(fetch, logger, appConfig.fetch);
  let failures = 0;

  for (const target of targets) {
    console.log(`Fetching ${target.name} (${target.brand})...`);
    const result = await fetcher.fetch(target);

    if (!result.success) {
      failures++;
      console.log(`  ❌ ${result.error.name}: ${result.error.message}\n`);
      continue;
    }

    for (const gym of result.data.gyms) {
      const lastUpdate = gym.data.lastUpdate?.toISOString() ?? 'never';
      console.log(
        `  • ${gym.shortCode} ${gym.location}: ${gym.data.count}/${gym.data.capacity} (updated ${lastUpdate})`
      );
    }
    console.log('');
  }

  process.exit(failures > 0 ? 1 : 0);
}

main().catch((error) => {
  console.error('\n❌ Fatal error:', error);
  process.exit(1);
});
