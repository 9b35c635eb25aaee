import { AlertState } from '../alerts/alert-state';
import type { AlertContext } from '../alerts/types';
import { validateFormula, ValidationResult } from '../formula';
import type { CompiledFormula, FormulaParseError } from '../formula';
import { createLogger } from '../utils/logger';

const log = createLogger('session');

export interface ScannerSessionOptions {
  formulaText: string;
  triggerName?: string;
  alertsEnabled?: boolean;
}

/**
 * Long-lived state of one running scanner: the active trigger, the alert
 * gate and the notified markers. Passed by reference into each cycle.
 */
export class ScannerSession implements AlertContext {
  readonly alertState = new AlertState();
  alertsEnabled: boolean;

  private _formulaText = '';
  private _triggerName = 'custom';
  private _formula: CompiledFormula | null = null;
  private _parseError: FormulaParseError | null = null;
  private _running = false;
  private _cycles = 0;

  constructor(opts: ScannerSessionOptions) {
    this.alertsEnabled = opts.alertsEnabled ?? false;
    this.setFormula(opts.formulaText, opts.triggerName);
  }

  get formulaText(): string {
    return this._formulaText;
  }

  get triggerName(): string {
    return this._triggerName;
  }

  /** Null when the active text does not parse; such a session never triggers */
  get formula(): CompiledFormula | null {
    return this._formula;
  }

  get parseError(): FormulaParseError | null {
    return this._parseError;
  }

  get running(): boolean {
    return this._running;
  }

  get cycles(): number {
    return this._cycles;
  }

  /**
   * Switch the active trigger. Changing the text forgets every notified
   * marker, so symbols already true under the new formula alert again.
   */
  setFormula(text: string, name = 'custom'): ValidationResult {
    const trimmed = text.trim();
    if (trimmed !== this._formulaText) {
      this.alertState.reset();
    }
    this._formulaText = trimmed;
    this._triggerName = name;

    const validation = validateFormula(trimmed);
    if (validation.ok) {
      this._formula = validation.formula;
      this._parseError = null;
      log.info('Trigger set', { name, formula: trimmed, lookback: validation.formula.maxLookback });
    } else {
      this._formula = null;
      this._parseError = validation.error;
      log.warn('Trigger formula rejected; scans will report no triggers', {
        name,
        formula: trimmed,
        code: validation.error.code,
        error: validation.error.message,
      });
    }
    return validation;
  }

  start(): void {
    this._running = true;
  }

  stop(): void {
    this._running = false;
  }

  /** Explicit restart clears the notified markers */
  restart(): void {
    this.alertState.reset();
    this._cycles = 0;
    this._running = true;
    log.info('Scanner restarted', { name: this._triggerName });
  }

  recordCycle(): number {
    return ++this._cycles;
  }
}
