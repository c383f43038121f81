/**
 * Runs `task` once `delayMs` after the last `trigger()`. Each trigger
 * cancels the pending run and schedules a new one.
 */
export class Debouncer {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly delayMs: number,
    private readonly task: () => Promise<void>,
    private readonly onError: (error: unknown) => void,
  ) {}

  trigger(): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.task().catch(this.onError);
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  get pending(): boolean {
    return this.timer !== undefined;
  }
}
