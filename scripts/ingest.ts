#!/usr/bin/env tsx
/**
 * Ingredient enrichment CLI
 *
 * Enriches fragrance ingredients from the chemical and odor-profile sources
 * and syncs regulatory limits into Supabase.
 *
 * Usage:
 *   npm run ingest -- enrich "Linalool"
 *   npm run ingest -- bulk --file ./names.txt --limit 50
 *   npm run ingest -- import-standards ./standards.csv --owner 1
 *   npm run ingest -- sync-all-limits --dry-run
 *   npm run ingest -- status --owner 1
 *
 * Credentials: NEXT_PUBLIC_SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY in
 * .env or .env.local (not needed with --dry-run).
 */

import { readFile } from 'fs/promises';
import { buildEnrichmentService } from '@/src/lib/enrichment/enrichment.factory';
import { loadEnrichmentConfig } from '@/src/lib/enrichment/enrichment.config';
import { isAppError } from '@/src/lib/errors/app-error';
import { InMemoryIngredientStore } from '@/src/lib/ingredients/ingredientStore.memory';
import { getIngredientStatus } from '@/src/lib/ingredients/ingredientStatus';
import { SupabaseIngredientStore } from '@/src/lib/ingredients/ingredientStore.supabase';
import type { IngredientStore } from '@/src/lib/ingredients/ingredientStore.types';
import {
  importStandardsFromFile,
  syncAllIngredients,
  syncIngredientLimits,
} from '@/src/lib/regulatory/regulatorySync.service';
import { createAdminClient } from '@/src/lib/supabase/admin';
import {
  INGEST_USAGE,
  parseIngestArgs,
  parseNamesList,
  type IngestArgs,
} from './ingest.args';

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function bulkNames(args: IngestArgs): Promise<string[]> {
  const names = [...args.positional];
  if (args.file) {
    names.push(...parseNamesList(await readFile(args.file, 'utf8')));
  }
  return names;
}

/** Returns true when the command succeeded */
async function run(args: IngestArgs): Promise<boolean> {
  const config = loadEnrichmentConfig();
  const owner = args.owner ?? config.defaultOwnerId;
  const store: IngredientStore = args.dryRun
    ? new InMemoryIngredientStore()
    : new SupabaseIngredientStore(createAdminClient());
  const service = buildEnrichmentService(config, store);
  const overwrite = args.overwrite ?? config.overwrite;

  if (args.dryRun) {
    console.log('🧪 Dry run: using an in-memory store, nothing is saved\n');
  }

  switch (args.command) {
    case 'search': {
      const result = await service.search(args.positional[0], { casHint: args.cas });
      print(result);
      return result.found;
    }
    case 'enrich': {
      const result = await service.enrich(args.positional[0], owner, {
        casHint: args.cas,
        overwrite,
      });
      print(result);
      return result.ok;
    }
    case 'bulk':
    case 'all-missing': {
      const target = args.command === 'bulk' ? await bulkNames(args) : 'all-missing';
      const { results, summary, error } = await service.bulkEnrich(target, owner, {
        limit: args.limit,
        overwrite,
      });
      for (const r of results) {
        const status = r.ok ? (r.created ? 'created' : r.updated ? 'updated' : 'unchanged') : 'failed';
        console.log(`${r.ok ? '✅' : '❌'} ${r.name}: ${status}${r.error ? ` (${r.error.message})` : ''}`);
      }
      console.log(
        `\n📊 ${summary.succeeded}/${summary.total} succeeded, ${summary.created} created, ${summary.updated} updated, ${summary.failed} failed`,
      );
      if (error) console.error(`❌ ${error.message}`);
      return !error && summary.failed === 0;
    }
    case 'import-standards': {
      const result = await importStandardsFromFile(args.file ?? '', store, owner);
      for (const e of result.errors) {
        console.log(`⚠️  line ${e.line}: ${e.reason}`);
      }
      console.log(`\n✨ Imported ${result.count} standards, ${result.errors.length} rows skipped`);
      return result.count > 0 || result.errors.length === 0;
    }
    case 'sync-limits': {
      const result = await syncIngredientLimits(store, args.positional[0], owner);
      print(result);
      return result.applied;
    }
    case 'sync-all-limits': {
      const counts = await syncAllIngredients(store, owner);
      print(counts);
      return counts.failed === 0 && !counts.error;
    }
    case 'status': {
      const status = await getIngredientStatus(store, owner);
      console.log(`📦 Ingredients for owner ${owner}: ${status.total}`);
      console.log(`   With CAS: ${status.withCas} (${status.casPercent}%)`);
      console.log(`   With odor profile: ${status.withOdorProfile} (${status.odorProfilePercent}%)`);
      console.log(`   Missing enrichment: ${status.missingEnrichment}`);
      console.log(
        `\n⚙️  Min interval: pubchem ${config.minIntervalMs.pubchem}ms, goodscents ${config.minIntervalMs.goodscents}ms; cache TTL ${config.cacheTtlMs}ms`,
      );
      return true;
    }
  }
}

async function main(): Promise<boolean> {
  let args: IngestArgs;
  try {
    args = parseIngestArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}\n`);
    console.error(INGEST_USAGE);
    return false;
  }
  return run(args);
}

main()
  .then((success) => {
    process.exit(success ? 0 : 1);
  })
  .catch((error: unknown) => {
    if (isAppError(error)) {
      console.error(`\n💥 ${error.code}: ${error.safeMessage}`);
    } else {
      console.error('\n💥 Fatal error:', error);
    }
    process.exit(1);
  });
