import { logger } from "../config/logger.js";

interface Compensation {
  label: string;
  run: () => Promise<void>;
}

/**
 * Undo actions pushed after each successful startup step. On a later failure
 * they run newest-first; each one is attempted even if an earlier one failed,
 * and their failures are logged, never thrown, so the original error stays
 * the one the caller sees.
 */
export class CompensationStack {
  private readonly actions: Compensation[] = [];

  push(label: string, run: () => Promise<void>): void {
    this.actions.push({ label, run });
  }

  get size(): number {
    return this.actions.length;
  }

  /** Run every pending compensation in reverse order. Returns the labels that failed. */
  async unwind(): Promise<string[]> {
    const failed: string[] = [];
    for (let action = this.actions.pop(); action; action = this.actions.pop()) {
      try {
        await action.run();
        logger.info(`Rollback: ${action.label}`);
      } catch (err) {
        failed.push(action.label);
        logger.error(`Rollback step failed: ${action.label}`, { err });
      }
    }
    return failed;
  }

  /** Forget pending compensations once startup has succeeded. */
  discard(): void {
    this.actions.length = 0;
  }
}
