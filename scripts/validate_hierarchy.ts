import { runValidateCli } from './lib/cli.js';
import { hasAnomalies } from './lib/hierarchy/validate.js';

async function main(): Promise<void> {
  const outcome = await runValidateCli();
  const failed = hasAnomalies(outcome.validation) || outcome.rejected > 0;

  if (outcome.check) {
    if (failed) {
      console.error(`${outcome.kind} hierarchy check failed.`);
      process.exit(1);
    }
    console.log(`${outcome.kind} hierarchy check passed.`);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
