import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { ProgressBar } from "../../src/lib/progress.js";

function captureStream(): { stream: Writable; output: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(Buffer.from(chunk));
      cb();
    },
  });
  return { stream, output: () => Buffer.concat(chunks).toString() };
}

describe("ProgressBar", () => {
  it("renders label, bar, percentage and count", () => {
    const { stream } = captureStream();
    const bar = new ProgressBar({ total: 4, label: "Silver", stream, width: 4 });
    bar.tick();
    expect(bar.render()).toBe("\rSilver █░░░ 25% (1/4)");
  });

  it("appends the detail of the last tick", () => {
    const { stream, output } = captureStream();
    const bar = new ProgressBar({ total: 2, stream, width: 2 });
    bar.tick(1, "crm_cust_info");
    expect(output()).toBe("\r█░ 50% (1/2) crm_cust_info");
    bar.tick();
    expect(bar.render()).toBe("\r██ 100% (2/2) crm_cust_info");
  });

  it("clamps update to the range", () => {
    const { stream } = captureStream();
    const bar = new ProgressBar({ total: 5, stream });
    bar.update(9);
    expect(bar.ratio).toBe(1);
    bar.update(-3);
    expect(bar.ratio).toBe(0);
  });

  it("finish fills the bar and ends the line", () => {
    const { stream, output } = captureStream();
    const bar = new ProgressBar({ total: 3, stream, width: 3 });
    bar.finish();
    expect(output()).toBe("\r███ 100% (3/3)\n");
  });

  it("abort ends the line without filling and ignores later ticks", () => {
    const { stream, output } = captureStream();
    const bar = new ProgressBar({ total: 3, stream, width: 3 });
    bar.tick();
    bar.abort();
    bar.tick();
    bar.finish();
    expect(output()).toBe("\r█░░ 33% (1/3)\n");
    expect(bar.ratio).toBeCloseTo(1 / 3);
  });

  it("treats a zero total as one step", () => {
    const { stream } = captureStream();
    const bar = new ProgressBar({ total: 0, stream, width: 2 });
    bar.tick();
    expect(bar.render()).toBe("\r██ 100% (1/1)");
  });
});
