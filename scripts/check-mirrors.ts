/**
 * One-shot mirror check without Redis or Postgres.
 * Usage: npx tsx scripts/check-mirrors.ts [--apply] [mirror-url ...]
 * Default: the MIRRORS list from the environment (or the built-in list)
 */
import { config } from '../src/config.js';
import { MIRRORS_FIELD, applyRecommendation } from '../src/daemon-config/apply.js';
import { synthesize } from '../src/daemon-config/recommend.js';
import { runBatch } from '../src/pipeline/aggregator.js';

const args = process.argv.slice(2);
const apply = args.includes('--apply');
const mirrors = args.filter((a) => !a.startsWith('--'));
const targets = mirrors.length > 0 ? mirrors : config.MIRRORS;

console.log(`Checking ${targets.length} mirrors (timeout ${config.PROBE_TIMEOUT_MS}ms)...\n`);

const batch = await runBatch(targets, {
  timeoutMs: config.PROBE_TIMEOUT_MS,
  taskCeilingMs: config.PROBE_TASK_CEILING_MS,
  concurrency: config.PROBE_CONCURRENCY,
});

for (const r of batch.results) {
  const mark = r.available ? '✓' : '✗';
  const latency = `${r.responseTimeMs.toFixed(0)}ms`.padStart(8);
  console.log(`  ${mark} ${latency}  ${r.endpoint}  (${r.statusLabel})`);
}

const missing = targets.length - batch.total;
console.log(`\n${batch.available}/${batch.total} available${missing > 0 ? `, ${missing} timed out` : ''}`);

const recommended = synthesize(batch, null, config.RECOMMENDED_MIRROR_COUNT);
console.log(`\nRecommended ${MIRRORS_FIELD}:`);
console.log(JSON.stringify(recommended.mirrors, null, 2));

if (apply) {
  const result = await applyRecommendation(recommended, {
    path: config.DAEMON_CONFIG_PATH,
    backupPath: config.DAEMON_CONFIG_BACKUP_PATH,
  });
  if (result.ok) {
    console.log(`\nWrote ${result.path}${result.backupPath ? ` (backup: ${result.backupPath})` : ''}`);
    console.log('Reload the daemon to apply: sudo systemctl daemon-reload && sudo systemctl restart docker');
  } else {
    console.error(`\nConfig not written: ${result.message}`);
    process.exitCode = 1;
  }
}
