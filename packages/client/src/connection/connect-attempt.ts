export type ConnectOutcome =
  | "connected"
  | "rejected"
  | "failed"
  | "timeout"
  | "cancelled"
  | "binding_died"
  | "unbound";

/**
 * One connect-and-wait cycle. Every concurrent caller shares the same outcome,
 * which is settled exactly once; later settle calls are ignored.
 */
export class ConnectAttempt {
  readonly outcome: Promise<boolean>;

  private resolveOutcome: (connected: boolean) => void = () => undefined;

  private settledWith: ConnectOutcome | undefined;

  private members = 0;

  constructor(readonly startedAt: number) {
    this.outcome = new Promise<boolean>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  get isSettled(): boolean {
    return this.settledWith !== undefined;
  }

  get result(): ConnectOutcome | undefined {
    return this.settledWith;
  }

  settle(outcome: ConnectOutcome): boolean {
    if (this.settledWith !== undefined) {
      return false;
    }
    this.settledWith = outcome;
    this.resolveOutcome(outcome === "connected");
    return true;
  }

  join(): void {
    this.members += 1;
  }

  /** Returns how many callers are still waiting. */
  leave(): number {
    this.members = Math.max(0, this.members - 1);
    return this.members;
  }
}
