import { InvalidTransitionError } from '../errors/DomainErrors.js';
import type { RenameChange, RenameOutcome } from './RenameChange.js';

export type RenameState = 'computed' | 'previewed' | 'applied' | 'cancelled';

const TRANSITIONS: Record<RenameState, readonly RenameState[]> = {
  computed: ['previewed', 'cancelled'],
  previewed: ['applied', 'cancelled'],
  applied: [],
  cancelled: [],
};

/**
 * 一次重新命名的狀態機：computed → previewed → {applied | cancelled}
 *
 * 終止狀態不可回頭；新的 rename 必須建立新的 transaction。
 * 空 changeset 可直接從 computed 套用（沒有任何連結會被改寫）。
 */
export class RenameTransaction {
  private currentState: RenameState = 'computed';
  private finalOutcome: RenameOutcome | undefined;

  constructor(
    readonly fromPath: string,
    readonly toPath: string,
    readonly newBasename: string,
    readonly changes: readonly RenameChange[],
  ) {}

  get state(): RenameState {
    return this.currentState;
  }

  get outcome(): RenameOutcome | undefined {
    return this.finalOutcome;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.currentState].length === 0;
  }

  markPreviewed(): void {
    this.transition('previewed');
  }

  cancel(): void {
    this.transition('cancelled');
  }

  /** 是否可進入套用階段 */
  canApply(): boolean {
    if (this.currentState === 'previewed') return true;
    return this.currentState === 'computed' && this.changes.length === 0;
  }

  markApplied(outcome: RenameOutcome): void {
    if (!this.canApply()) {
      throw new InvalidTransitionError(this.currentState, 'applied');
    }
    this.currentState = 'applied';
    this.finalOutcome = outcome;
  }

  /** 依檔案分組的變更數 */
  changesPerFile(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const c of this.changes) {
      counts.set(c.file, (counts.get(c.file) ?? 0) + 1);
    }
    return counts;
  }

  private transition(to: RenameState): void {
    if (!TRANSITIONS[this.currentState].includes(to)) {
      throw new InvalidTransitionError(this.currentState, to);
    }
    this.currentState = to;
  }
}
