import { runSyncCli } from './lib/cli.js';
import { hasFailures } from './lib/hierarchy/report.js';

async function main(): Promise<void> {
  const report = await runSyncCli();

  if (hasFailures(report)) {
    console.error(`${report.kind} sync finished with ${report.errors + report.parentErrors} failed node(s).`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
