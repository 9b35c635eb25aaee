/**
 * check-triggers.ts
 *
 * Compile every formula in the trigger library and report the ones that do
 * not parse. A broken formula never alerts at run time, so run this after
 * editing config/triggers.json.
 *
 * Usage:
 *   npx tsx scripts/check-triggers.ts [path/to/triggers.json]
 */

import { config, createLogger } from '../src/utils';
import { loadTriggerLibrary } from '../src/scanner';
import { validateFormula } from '../src/formula';

const log = createLogger('check-triggers');

function main() {
  const filePath = process.argv[2] || config.triggers.file;
  const library = loadTriggerLibrary(filePath);

  let failures = 0;
  for (const [name, formula] of library) {
    const result = validateFormula(formula);
    if (result.ok) {
      log.info('OK', { name, formula, lookback: result.formula.maxLookback });
    } else {
      failures++;
      log.error('Invalid trigger', { name, formula, code: result.error.code, error: result.error.message });
    }
  }

  log.info('Done', { total: library.size, failures });
  process.exit(failures > 0 ? 1 : 0);
}

main();
