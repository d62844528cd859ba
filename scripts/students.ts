import { config as loadEnv } from 'dotenv';
import { runMenu } from '../src/cli/menu';
import { LinePrompter } from '../src/cli/prompt';
import { loadConfig } from '../src/lib/config';
import { createLogger, setLogLevel } from '../src/lib/logger';
import { StudentManager } from '../src/lib/manager';
import { loadSeedFile, seedManager } from '../src/lib/seed';

loadEnv();

const log = createLogger('students');

async function main() {
  const { config, warnings } = loadConfig();
  setLogLevel(config.logLevel);
  for (const warning of warnings) {
    log.warn(warning);
  }

  const manager = new StudentManager({ nameSearch: config.nameSearch });
  const seeds = await loadSeedFile(config.seedFile);
  seedManager(manager, seeds, config.seedFile);

  const prompter = new LinePrompter(process.stdin, process.stdout);
  try {
    await runMenu(manager, prompter, process.stdout);
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  log.error('Student records console failed', err);
  process.exitCode = 1;
});
