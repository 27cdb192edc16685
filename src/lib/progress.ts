/**
 * Terminal progress bar for load and batch runs.
 *
 *   const bar = new ProgressBar({ total: 6, label: "Silver" });
 *   bar.tick(1, "crm_cust_info");
 *   bar.finish();
 */

export interface ProgressBarOptions {
  total: number;
  label?: string;
  /** Bar width in characters (default 30). */
  width?: number;
  /** Defaults to process.stderr. */
  stream?: NodeJS.WritableStream;
}

export class ProgressBar {
  private readonly total: number;
  private readonly label: string;
  private readonly width: number;
  private readonly stream: NodeJS.WritableStream;
  private current = 0;
  private detail = "";
  private finished = false;

  constructor(options: ProgressBarOptions) {
    this.total = Math.max(options.total, 1);
    this.label = options.label ?? "";
    this.width = options.width ?? 30;
    this.stream = options.stream ?? process.stderr;
  }

  /** Advance by `n` steps; `detail` names the item just finished. */
  tick(n = 1, detail?: string): void {
    this.update(this.current + n, detail);
  }

  update(value: number, detail?: string): void {
    if (this.finished) return;
    this.current = Math.min(Math.max(value, 0), this.total);
    if (detail !== undefined) this.detail = detail;
    this.stream.write(this.render());
  }

  finish(): void {
    if (this.finished) return;
    this.current = this.total;
    this.stream.write(this.render() + "\n");
    this.finished = true;
  }

  /** Stop without filling the bar, e.g. when the run failed. */
  abort(): void {
    if (this.finished) return;
    this.stream.write("\n");
    this.finished = true;
  }

  get ratio(): number {
    return this.current / this.total;
  }

  render(): string {
    const pct = Math.round(this.ratio * 100);
    const filled = Math.round(this.ratio * this.width);
    const bar = "█".repeat(filled) + "░".repeat(this.width - filled);
    const prefix = this.label ? `${this.label} ` : "";
    const suffix = this.detail ? ` ${this.detail}` : "";
    return `\r${prefix}${bar} ${pct}% (${this.current}/${this.total})${suffix}`;
  }
}
