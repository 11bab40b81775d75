/**
 * One-shot latch. Once set it stays set; every current and future
 * `wait()` resolves.
 */
export class Signal {
  private setFlag = false;
  private release: (() => void) | null = null;
  private readonly settled: Promise<void>;

  constructor() {
    this.settled = new Promise<void>(resolve => {
      this.release = resolve;
    });
  }

  /** Sets the latch. Further calls are no-ops. */
  set(): void {
    if (this.setFlag) return;
    this.setFlag = true;
    this.release?.();
    this.release = null;
  }

  get isSet(): boolean {
    return this.setFlag;
  }

  wait(): Promise<void> {
    return this.settled;
  }
}
