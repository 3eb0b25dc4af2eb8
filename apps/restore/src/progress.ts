import { formatBytes } from "@archive-restore/shared";

type Log = (line: string) => void;

/** Byte progress for long transfers, printed once per 10% step. */
export class Progress {
  private current = 0;
  private lastStep = -1;

  constructor(
    private readonly message: string,
    private readonly total: number,
    private readonly log: Log = console.log
  ) {}

  update(delta: number) {
    this.setCurrent(this.current + delta);
  }

  setCurrent(value: number) {
    this.current = value;
    if (this.total <= 0) return;
    const step = Math.min(10, Math.floor((this.current / this.total) * 10));
    if (step === this.lastStep) return;
    this.lastStep = step;
    this.log(
      `${this.message}: ${formatBytes(this.current)} / ${formatBytes(this.total)} (${step * 10}%)`
    );
  }

  get value(): number {
    return this.current;
  }
}
