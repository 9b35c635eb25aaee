import fs from 'fs';
import { createLogger } from '../utils/logger';

const log = createLogger('triggers');

/** Trigger name → formula text, in file order */
export type TriggerLibrary = Map<string, string>;

export interface ActiveTrigger {
  name: string;
  formula: string;
}

export function parseTriggerLibrary(raw: string, source = 'triggers'): TriggerLibrary {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${source} must be a JSON object of { name: formula }`);
  }

  const library: TriggerLibrary = new Map();
  for (const [name, formula] of Object.entries(parsed)) {
    if (typeof formula !== 'string' || !formula.trim()) {
      log.warn('Skipping trigger without formula text', { name });
      continue;
    }
    library.set(name, formula.trim());
  }
  return library;
}

export function loadTriggerLibrary(filePath: string): TriggerLibrary {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Trigger library not found: ${filePath}`);
  }
  const library = parseTriggerLibrary(fs.readFileSync(filePath, 'utf-8'), filePath);
  log.info('Trigger library loaded', { path: filePath, count: library.size });
  return library;
}

/**
 * An explicit formula wins; otherwise the named entry; otherwise the first
 * entry in the library.
 */
export function resolveActiveTrigger(
  library: TriggerLibrary,
  selection: { name?: string; formula?: string },
): ActiveTrigger {
  if (selection.formula) {
    return { name: selection.name || 'custom', formula: selection.formula.trim() };
  }
  if (selection.name) {
    const formula = library.get(selection.name);
    if (formula === undefined) {
      throw new Error(`Unknown trigger "${selection.name}"; available: ${Array.from(library.keys()).join(', ')}`);
    }
    return { name: selection.name, formula };
  }
  const first = library.entries().next();
  if (first.done) {
    throw new Error('Trigger library is empty and no TRIGGER_FORMULA is set');
  }
  const [name, formula] = first.value;
  return { name, formula };
}
