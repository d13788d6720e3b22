import { runFixYamlCompliance } from './lib/commands.js';

async function main(): Promise<void> {
  const status = await runFixYamlCompliance(process.argv.slice(2));
  if (status !== 0) {
    process.exit(status);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
