import { runExportCli } from './lib/cli.js';
import { getRunOptions } from './lib/io.js';

async function main(): Promise<void> {
  const result = await runExportCli();

  if (getRunOptions(process.argv.slice(2)).check && result.changed) {
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
